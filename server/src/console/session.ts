/**
 * Console session - the interactive terminal conversation with the persona
 */
import type { Persona, SpeechRecognizer, SpeechSynthesizer } from '../types/index';
import type { ReplyGenerator } from '../services/generation';
import { LoggerService } from '../services/logger';
import { generateBanner } from '../utils/banner';
import { isExitCommand } from '../utils/commands';
import { normalizeResponse } from '../utils/response-normalizer';
import { sleep, waitAtMost } from '../utils/timing';
import type { ConsoleIO } from './io';
import { THEME, paint, slowPrint, type Delay } from './render';

export const TYPING_DELAY_MS = 40;
export const LINE_PAUSE_MS = 200;
export const PLAYBACK_WAIT_MS = 15000;

export interface ConsoleSessionOptions {
  io: ConsoleIO;
  persona: Persona;
  generation: ReplyGenerator;
  synthesis: SpeechSynthesizer;
  recognition?: SpeechRecognizer;
  logger: LoggerService;
  sttDurationSeconds?: number;
  /**
   * Used for every pause (typing, line breaks); tests pass a no-op
   */
  delay?: Delay;
  playbackWaitMs?: number;
}

/**
 * Result of reading one prompt: a message, nothing to do, or the end of the session
 */
type Turn =
  | { type: 'message'; text: string }
  | { type: 'skip' }
  | { type: 'exit' }
  | { type: 'interrupted' };

export class ConsoleSession {
  private readonly options: ConsoleSessionOptions;
  private readonly delay: Delay;

  constructor(options: ConsoleSessionOptions) {
    this.options = options;
    this.delay = options.delay ?? sleep;
  }

  private get sttEnabled(): boolean {
    return this.options.recognition?.enabled ?? false;
  }

  /**
   * Runs the session until an exit keyword or end of input
   * @returns Process exit code
   */
  async run(): Promise<number> {
    const { io, persona, generation, synthesis } = this.options;

    generateBanner({
      title: persona.name.toUpperCase(),
      backend: generation.backendKind,
      tts: synthesis.enabled,
      stt: this.sttEnabled,
    }).forEach((line) => io.write(`${line}\n`));

    if (this.sttEnabled) {
      io.write(`${paint("Speech-to-text enabled (press 's' + Enter to speak)", THEME.system)}\n\n`);
    }

    await this.respond(persona.welcomeMessage);
    io.write(`${paint("(Type 'exit' to leave)", THEME.system)}\n\n`);

    const ending = await this.loop();

    const goodbye = normalizeResponse(persona.goodbyeMessage);
    if (ending === 'exit') {
      await this.respond(goodbye);
    } else {
      // Forced exit: text only
      io.write(`\n${paint(goodbye, THEME.conch)}\n\n`);
    }

    return 0;
  }

  private async loop(): Promise<'exit' | 'interrupted'> {
    for (;;) {
      const turn = await this.readTurn();
      if (turn.type === 'exit' || turn.type === 'interrupted') {
        return turn.type;
      }
      if (turn.type === 'message') {
        await this.answer(turn.text);
      }
    }
  }

  private async readTurn(): Promise<Turn> {
    const { io, recognition } = this.options;
    const question = this.sttEnabled
      ? "You (press Enter to type, or 's' + Enter to speak): "
      : 'You: ';

    const line = await io.prompt(question);
    if (line === null) {
      return { type: 'interrupted' };
    }

    let text = line.trim();
    if (text.toLowerCase() === 's' && recognition?.enabled) {
      const transcript = await recognition.transcribe(this.options.sttDurationSeconds ?? 5);
      if (!transcript) {
        io.write(`${paint('Could not understand speech. Please try typing instead.', THEME.error)}\n\n`);
        return { type: 'skip' };
      }
      io.write(`${paint(`You said: "${transcript}"`, THEME.conch)}\n\n`);
      text = transcript.trim();
    }

    if (!text) {
      return { type: 'skip' };
    }
    if (isExitCommand(text)) {
      return { type: 'exit' };
    }
    return { type: 'message', text };
  }

  private async answer(userMessage: string): Promise<void> {
    const { io, persona, generation, logger } = this.options;

    io.write(`${paint('... processing ...', THEME.system)}\n`);
    const raw = await generation.generate({ userMessage, systemPrompt: persona.systemPrompt });
    const reply = normalizeResponse(raw);
    logger.debug(`Reply generated (${reply.length} chars)`);

    if (!reply) {
      io.write(`${paint('... no response ...', THEME.error)}\n\n`);
      return;
    }
    await this.respond(reply);
  }

  /**
   * Prints a reply with the typing effect while its audio plays
   */
  private async respond(text: string): Promise<void> {
    const { io, synthesis } = this.options;
    io.write('\n');

    const handle = synthesis.enabled ? await synthesis.synthesize(text) : null;
    const playback = handle ? synthesis.play(handle) : null;

    for (const line of text.split('\n')) {
      if (line.trim()) {
        await slowPrint((chunk) => io.write(chunk), line, TYPING_DELAY_MS, this.delay);
      } else {
        io.write('\n');
      }
      await this.delay(LINE_PAUSE_MS);
    }
    io.write('\n');

    if (playback) {
      await waitAtMost(playback, this.options.playbackWaitMs ?? PLAYBACK_WAIT_MS);
    }
  }
}
