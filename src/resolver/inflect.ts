/** Plural of a single English word. */
export function pluralizeWord(word: string): string {
  if (/[^aeiou]y$/i.test(word)) return `${word.slice(0, -1)}ies`
  if (/(s|x|z|ch|sh)$/i.test(word)) return `${word}es`
  return `${word}s`
}

/**
 * Plural of a display name. Only the last word inflects, so
 * "Iron Plate" becomes "Iron Plates" and "Recipe: Battery" becomes "Recipe: Batteries".
 */
export function pluralize(name: string): string {
  const match = name.match(/^(.*?)([A-Za-z]+)(\W*)$/)
  if (!match) return name
  const [, head = "", last = "", tail = ""] = match
  return `${head}${pluralizeWord(last)}${tail}`
}
