export {
  GoogleTranslateSpeechProvider,
  OpenAISpeechProvider,
  GeminiSpeechProvider,
  OPENAI_VOICES,
  createSpeechProvider,
  type SpeechProvider,
  type SpeechClip,
  type SpeechProviderName,
  type SpeechProviderSettings,
  type GoogleTranslateSpeechOptions,
  type OpenAISpeechOptions,
  type GeminiSpeechOptions,
  type OpenAIVoiceId,
} from './speech.js';
export {
  DuckDuckGoImageSearch,
  PexelsImageSearch,
  createImageSearchProvider,
  type ImageSearchProvider,
  type ImageCandidate,
  type ImageSearchProviderName,
  type DuckDuckGoImageSearchOptions,
  type PexelsImageSearchOptions,
} from './image-search.js';
