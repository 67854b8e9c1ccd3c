import { ChildProcess, spawn } from 'child_process';
import which from 'which';
import { Locale, Speaker } from '../types';
import { ResourceUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';

export interface SpeechEngine {
  name: string;
  command: string;
  args(text: string): string[];
  /** Some engines hand speech to a daemon; killing the client does not silence it. */
  cancelArgs?: string[];
}

export type CommandLookup = (command: string) => string | null;

const findOnPath: CommandLookup = command => which.sync(command, { nothrow: true });

const SENTENCE_END = /[.!?]$/;

/**
 * Joins non-blank parts with a pause. A part that already ends a sentence
 * keeps its own punctuation and is followed by a plain space.
 */
export function joinSpeechParts(parts: string[], pause = '. '): string {
  return parts
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .reduce((spoken, part) => {
      if (!spoken) {
        return part;
      }
      return SENTENCE_END.test(spoken) ? `${spoken} ${part}` : `${spoken}${pause}${part}`;
    }, '');
}

function windowsEngine(language: Locale): SpeechEngine {
  const culturePrefix = language === 'de' ? 'de-*' : 'en-*';
  return {
    name: 'powershell',
    command: 'powershell',
    args: text => {
      const safe = text.replace(/"/g, '`"');
      const script = [
        'Add-Type -AssemblyName System.Speech;',
        '$synth = New-Object System.Speech.Synthesis.SpeechSynthesizer;',
        '$voice = $synth.GetInstalledVoices() |',
        `Where-Object { $_.VoiceInfo.Culture.Name -like '${culturePrefix}' } |`,
        'Select-Object -First 1;',
        'if ($voice) { $synth.SelectVoice($voice.VoiceInfo.Name) };',
        `$synth.Speak("${safe}");`
      ].join(' ');
      return ['-NoProfile', '-Command', script];
    }
  };
}

/**
 * Pick the speech engine for this platform.
 * @throws ResourceUnavailableError when nothing usable is installed
 */
export function detectSpeechEngine(
  platform: NodeJS.Platform,
  language: Locale,
  lookup: CommandLookup = findOnPath
): SpeechEngine {
  if (platform === 'win32') {
    if (lookup('powershell')) {
      return windowsEngine(language);
    }
    throw new ResourceUnavailableError('PowerShell not found; cannot speak on this Windows setup.');
  }

  if (platform === 'darwin' && lookup('say')) {
    return { name: 'say', command: 'say', args: text => [text] };
  }

  if (lookup('spd-say')) {
    return {
      name: 'spd-say',
      command: 'spd-say',
      args: text => ['--wait', '-l', language, text],
      cancelArgs: ['--cancel']
    };
  }

  for (const command of ['espeak-ng', 'espeak']) {
    if (lookup(command)) {
      return { name: command, command, args: text => ['-v', language, text] };
    }
  }

  throw new ResourceUnavailableError(
    'No TTS engine found. On Ubuntu/Debian install espeak-ng or speech-dispatcher (see setup-tts).'
  );
}

export class NullSpeaker implements Speaker {
  readonly enabled = false;

  speak(_text: string): void {}

  async speakAndWait(_text: string): Promise<void> {}

  stop(): void {}
}

/**
 * Speaks through an OS speech command. At most one utterance plays at a time.
 */
export class SystemSpeaker implements Speaker {
  readonly enabled = true;
  private child: ChildProcess | null = null;
  private warned = false;

  constructor(private readonly engine: SpeechEngine) {}

  speak(text: string): void {
    this.start(text);
  }

  speakAndWait(text: string): Promise<void> {
    const child = this.start(text);
    if (!child) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      child.once('close', () => resolve());
      child.once('error', () => resolve());
    });
  }

  stop(): void {
    const child = this.child;
    this.child = null;
    if (!child || child.exitCode !== null || child.signalCode !== null) {
      return;
    }

    child.kill();
    if (this.engine.cancelArgs) {
      this.run(this.engine.cancelArgs);
    }
  }

  private start(text: string): ChildProcess | null {
    const trimmed = text.trim();
    if (!trimmed) {
      return null;
    }

    // Never let two prompts overlap
    this.stop();

    const child = this.run(this.engine.args(trimmed));
    this.child = child;
    child.once('exit', () => {
      if (this.child === child) {
        this.child = null;
      }
    });
    return child;
  }

  private run(args: string[]): ChildProcess {
    const child = spawn(this.engine.command, args, { stdio: 'ignore' });
    child.on('error', error => {
      if (this.child === child) {
        this.child = null;
      }
      this.warnOnce(`[TTS] Could not start speech with ${this.engine.name}: ${error.message}`);
    });
    return child;
  }

  private warnOnce(message: string): void {
    if (this.warned) {
      return;
    }
    this.warned = true;
    logger.warn(message);
  }
}
