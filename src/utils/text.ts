/**
 * Lowercase, trim and strip diacritics: "Cupão Ânual " -> "cupao anual"
 */
export function normalizeText(value: string | null | undefined): string {
  return (value ?? '')
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .trim()
    .toLowerCase();
}
