/**
 * The queues that chain the stages together
 */
export const Queue = {
  RecognitionInput: 'ASR_input',
  RecognitionOutput: 'ASR_output',
  TranslationInput: 'MT_input',
  TranslationOutput: 'MT_output',
  SynthesisInput: 'TTS_input',
  SynthesisOutput: 'TTS_output'
} as const
