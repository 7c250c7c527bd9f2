export { LoggerService } from './logger';
export { PersonaService } from './persona';
export { GenerationService } from './generation';
export type { ReplyGenerator } from './generation';
export { SpeechSynthesisService } from './speech-synthesis';
export { SpeechRecognitionService } from './speech-recognition';
export { AudioCacheService } from './audio-cache';
