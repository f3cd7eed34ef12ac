/**
 * Team Name Normalization
 *
 * Slugs for city/team identities and the "City Nickname" splitter used by
 * name-based league feeds.
 */

export interface CityTeamSplit {
  city: string;
  nickname: string;
}

/**
 * Lowercase, whitespace-to-hyphen slug ("St. Louis" → "st-louis")
 */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/\./g, '')
    .replace(/\//g, '-')
    .replace(/\s+/g, '-');
}

/**
 * City identity: slug of the name, with the state appended only when the
 * caller needs it to tell two same-named cities apart.
 */
export function cityIdFor(cityName: string, disambiguatingState?: string): string {
  const base = slugify(cityName);
  const state = (disambiguatingState ?? '').trim().toLowerCase();
  return state ? `${base}-${state}` : base;
}

/**
 * Split a full team name into (city, nickname).
 *
 * Known multi-word nicknames are tried longest first and must sit at the end
 * of the name after a space. Otherwise the last word is the nickname:
 *   "Toronto Maple Leafs" → (Toronto, Maple Leafs)
 *   "New York Rangers"    → (New York, Rangers)
 *   "Sharks"              → (Sharks, "")
 */
export function splitCityTeam(fullName: string, multiWordNicknames: readonly string[]): CityTeamSplit {
  const name = fullName.trim().replace(/\s+/g, ' ');
  if (!name) {
    return { city: '', nickname: '' };
  }

  const lowered = name.toLowerCase();
  const candidates = [...multiWordNicknames].sort((a, b) => b.length - a.length);

  for (const nick of candidates) {
    const suffix = nick.toLowerCase();
    if (lowered === suffix) {
      return { city: '', nickname: name };
    }
    if (lowered.endsWith(` ${suffix}`)) {
      const cut = name.length - suffix.length;
      return { city: name.slice(0, cut).trim(), nickname: name.slice(cut) };
    }
  }

  const lastSpace = name.lastIndexOf(' ');
  if (lastSpace === -1) {
    return { city: name, nickname: '' };
  }
  return { city: name.slice(0, lastSpace), nickname: name.slice(lastSpace + 1) };
}
