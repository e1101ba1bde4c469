// Quick excision handles single self-touches in one pass; anything else goes
// through the elementary cycle search.
export const QUICK_EXCISION = true

// Decimal places kept when writing path coordinates.
export const OUTPUT_PRECISION = 6

// Contour handle generation.
export const ID_ALPHABET = '1234567890abcdef'
export const ID_LENGTH = 16
