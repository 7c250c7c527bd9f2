/**
 * Speech synthesis and recognition type definitions
 */

/**
 * Synthesized utterance staged on disk and addressable by id
 */
export interface AudioHandle {
  id: string;
  filePath: string;
  createdAt: number;
}

export interface SpeechSynthesizer {
  readonly enabled: boolean;
  synthesize(text: string): Promise<AudioHandle | null>;
  play(handle: AudioHandle): Promise<void>;
}

export interface SpeechRecognizer {
  readonly enabled: boolean;
  transcribe(durationSeconds: number): Promise<string | null>;
}

/**
 * Turns a recorded audio file into text
 */
export interface Transcriber {
  readonly name: string;
  transcribe(audioFile: string): Promise<string | null>;
}
