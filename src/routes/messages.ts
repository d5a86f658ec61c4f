export const CONVERSION_WARNING =
  "Image format could not be converted to WebP; the original file was stored.";

export function conversionWarnings(imageConverted: boolean | undefined): string[] {
  return imageConverted === false ? [CONVERSION_WARNING] : [];
}
