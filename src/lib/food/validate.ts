/**
 * Reject names that cannot be a menu item before any source is queried:
 * chat filler, bare numbers and prices, one-letter fragments.
 */

const NON_FOOD_WORDS = new Set([
  'hi', 'hello', 'hey', 'thanks', 'thank you', 'ok', 'okay', 'yes', 'no', 'lol', 'cool', 'nice', 'k',
  'nope', 'yep', 'nah', 'asdf', 'asdfghjk', 'test', 'unknown', 'other', 'none', 'n/a', 'na', 'tbd',
  'menu', 'price', 'prices', 'total', 'subtotal', 'tax', 'tip', 'specials', 'sold out',
])

const MIN_FOOD_NAME_LENGTH = 2

export function isPlausibleFood(name: string): boolean {
  const t = name.trim().toLowerCase().replace(/\s+/g, ' ')
  if (t.length < MIN_FOOD_NAME_LENGTH) return false
  if (NON_FOOD_WORDS.has(t)) return false
  if (!/[a-z]/.test(t)) return false
  // "$12.99", "12 oz", "3 for $5"
  if (/^[$\d.,\s]*(oz|g|lbs?|kg|ml|for)?[$\d.,\s]*$/.test(t)) return false
  if (/^[a-z]$/.test(t)) return false
  return true
}
