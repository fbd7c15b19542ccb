const UNQUOTED_KEY = /([{,]\s*)([A-Za-z_][A-Za-z0-9_]*)\s*:/g
const MISSING_COMMA = /("|\d|true|false|null|\}|\])(\s+)(?="[^"]*"\s*:)/g

/**
 * Best-effort normalisation of JSON produced by lenient serializers: single quotes,
 * unquoted keys, missing commas between pairs and missing outer braces.
 *
 * @returns the parsed value, or undefined if the text still isn't valid JSON
 */
export const repairJson = (text: string): unknown => {
  let candidate = text.trim()
  if (!candidate.startsWith('{')) {
    candidate = `{${candidate}`
  }
  if (!candidate.endsWith('}')) {
    candidate = `${candidate}}`
  }

  candidate = candidate
    .replace(/'/g, '"')
    .replace(UNQUOTED_KEY, '$1"$2":')
    .replace(MISSING_COMMA, '$1,$2')

  try {
    return JSON.parse(candidate)
  } catch {
    return undefined
  }
}
