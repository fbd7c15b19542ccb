import { z } from 'zod'
import { MalformedPayload } from '../error'
import { repairJson } from '../repair'
import { errorMessage } from '../util'
import { StageCodec } from './transform'

export interface JsonCodecOptions {
  /**
   * Attempt a best-effort repair of input that isn't valid JSON before declaring it malformed
   * @default false
   */
  repairMalformedJson?: boolean
}

const summarizeIssues = (error: z.ZodError): string =>
  error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ')

const utf8 = new TextDecoder('utf-8', { fatal: true })

/**
 * Decodes a payload as UTF-8, failing on invalid byte sequences rather than
 * substituting replacement characters
 */
export const decodeUtf8 = (payload: Buffer): string => utf8.decode(payload)

const parseJson = (text: string, repair: boolean): unknown => {
  try {
    return JSON.parse(text)
  } catch (error) {
    const repaired = repair ? repairJson(text) : undefined
    if (repaired === undefined) {
      throw error
    }
    return repaired
  }
}

/**
 * Decodes a JSON payload and validates it against a schema
 * @throws MalformedPayload if the payload isn't JSON or doesn't match the schema
 */
export const decodeJson = <T>(
  payload: Buffer,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: JsonCodecOptions = {}
): T => {
  let text: string
  try {
    text = decodeUtf8(payload)
  } catch (error) {
    throw new MalformedPayload(`Payload is not valid UTF-8: ${errorMessage(error)}`, payload)
  }

  let parsed: unknown
  try {
    parsed = parseJson(text, options.repairMalformedJson ?? false)
  } catch (error) {
    throw new MalformedPayload(`Malformed JSON: ${errorMessage(error)}`, payload)
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    throw new MalformedPayload(
      `Payload does not match the expected shape: ${summarizeIssues(result.error)}`,
      payload
    )
  }
  return result.data
}

/**
 * Validates a value against a schema and serializes it as JSON
 * @throws MalformedPayload if the value doesn't match the schema or can't be serialized
 */
export const encodeJson = <T>(
  value: T,
  schema: z.ZodType<unknown, z.ZodTypeDef, unknown>
): Buffer => {
  let serialized: string | undefined
  try {
    serialized = JSON.stringify(value)
  } catch (error) {
    throw new MalformedPayload(
      `Output can't be serialized: ${errorMessage(error)}`,
      Buffer.from(String(value))
    )
  }
  if (serialized === undefined) {
    throw new MalformedPayload('Output has no JSON representation', Buffer.from(String(value)))
  }

  const payload = Buffer.from(serialized)
  const result = schema.safeParse(value)
  if (!result.success) {
    throw new MalformedPayload(
      `Output does not match the expected shape: ${summarizeIssues(result.error)}`,
      payload
    )
  }
  return payload
}

/**
 * A codec for stages that read and write JSON messages
 */
export const jsonCodec = <TInput, TOutput>(
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>,
  outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>,
  options: JsonCodecOptions = {}
): StageCodec<TInput, TOutput> => ({
  decode: (payload: Buffer): TInput => decodeJson(payload, inputSchema, options),
  encode: (output: TOutput): Buffer => encodeJson(output, outputSchema)
})
