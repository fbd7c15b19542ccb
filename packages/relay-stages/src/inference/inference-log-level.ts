/**
 * Log levels that tag entries written by the inference stages, alongside the generic
 * INFO, WARNING and ERROR levels
 */
export const InferenceLogLevel = {
  AsrInference: 'ASR_INFERENCE',
  TranslationSuccess: 'TRANSLATION_SUCCESS',
  TranslationError: 'TRANSLATION_ERROR',
  TtsSuccess: 'TTS_SUCCESS',
  TtsError: 'TTS_ERROR'
} as const
