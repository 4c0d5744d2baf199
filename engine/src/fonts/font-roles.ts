export const FONT_ROLES = ['header', 'name', 'address', 'phone', 'labelTitle', 'cod'] as const;

export type FontRole = (typeof FONT_ROLES)[number];

/** Role names older settings screens and print paths used before the split by element. */
export const LEGACY_FONT_ROLE_ALIASES = {
  title: 'labelTitle',
  subtitle: 'header',
  content: 'name',
  small: 'phone',
} as const satisfies Record<string, FontRole>;

export type LegacyFontRole = keyof typeof LEGACY_FONT_ROLE_ALIASES;

export type FontRoleParseResult =
  | { kind: 'role'; role: FontRole; legacy: boolean }
  | { kind: 'unknown'; input: string };

// Role keys arrive in any case from stored layouts (`labeltitle`, `Header`).
const ROLE_LOOKUP = new Map<string, { role: FontRole; legacy: boolean }>([
  ...FONT_ROLES.map((role) => [role.toLowerCase(), { role, legacy: false }] as const),
  ...Object.entries(LEGACY_FONT_ROLE_ALIASES).map(
    ([alias, role]) => [alias.toLowerCase(), { role, legacy: true }] as const
  ),
]);

export const FALLBACK_FONT_ROLE: FontRole = 'name';

export function parseFontRole(input: string): FontRoleParseResult {
  const match = ROLE_LOOKUP.get(input.trim().toLowerCase());
  if (!match) {
    return { kind: 'unknown', input };
  }

  return { kind: 'role', role: match.role, legacy: match.legacy };
}

/**
 * String boundary for callers that still pass free-form role keys. Unknown keys
 * resolve to {@link FALLBACK_FONT_ROLE}; inside the engine use {@link parseFontRole}.
 */
export function resolveFontRoleKey(input: string): FontRole {
  const parsed = parseFontRole(input);
  return parsed.kind === 'role' ? parsed.role : FALLBACK_FONT_ROLE;
}

export function isFontRole(value: string): value is FontRole {
  return FONT_ROLES.some((role) => role === value);
}
