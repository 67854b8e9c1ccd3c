import * as readline from 'readline';
import { Prompter } from '../types';
import { InterruptedError } from '../utils/errors';

export interface ReadlinePrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

interface PendingQuestion {
  resolve: (line: string) => void;
  reject: (error: Error) => void;
}

/**
 * Line input over readline. Lines typed or piped ahead of a question are
 * queued and answer the next questions in order. Ctrl+C or end of input
 * rejects the pending question with InterruptedError, and every later
 * question once the queue is drained.
 */
export class ReadlinePrompter implements Prompter {
  private rl: readline.Interface;
  private lines: string[] = [];
  private pending: PendingQuestion | null = null;
  private closed = false;

  constructor(options: ReadlinePrompterOptions = {}) {
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: options.output ?? process.stdout
    });

    this.rl.on('line', line => {
      const pending = this.pending;
      if (pending) {
        this.pending = null;
        pending.resolve(line);
      } else {
        this.lines.push(line);
      }
    });
    this.rl.on('SIGINT', () => this.close());
    this.rl.on('close', () => {
      this.closed = true;
      this.interruptPending();
    });
  }

  ask(question: string): Promise<string> {
    const queued = this.lines.shift();
    if (queued !== undefined) {
      return Promise.resolve(queued);
    }
    if (this.closed) {
      return Promise.reject(new InterruptedError());
    }

    this.rl.setPrompt(question);
    this.rl.prompt();
    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
    });
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.interruptPending();
      this.rl.close();
    }
  }

  private interruptPending(): void {
    const pending = this.pending;
    this.pending = null;
    pending?.reject(new InterruptedError());
  }
}
