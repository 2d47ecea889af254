/** Credential values shipped in example env files. Treated the same as a missing key. */
export const PLACEHOLDER_CREDENTIALS = {
  stormglass: 'your_stormglass_key_here',
  worldTides: 'your_worldtides_key_here',
  openai: 'your_openai_key_here',
} as const;

export function isConfiguredCredential(value: string | undefined, placeholder?: string): value is string {
  if (value === undefined) return false;
  const trimmed = value.trim();
  return trimmed.length > 0 && trimmed !== placeholder;
}
