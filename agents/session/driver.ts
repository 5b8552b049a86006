/**
 * Interactive Session Driver
 *
 * Reads one request per line and prints the coordinator's response:
 *
 *   history            → task history for this session
 *   quit/exit/bye/q    → end the session
 *   (empty line)       → ignored
 *   anything else      → Coordinator.handle
 *
 * interrupt() aborts the in-flight backend call and ends the session.
 * End of input ends it too.
 */

import { createInterface, type Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import { UserInterrupt } from '../../core/errors.js';
import { DEFAULT_HISTORY_LIMIT, summarizeHistory, type Coordinator } from '../orchestration/index.js';
import type { ContextStore } from '../state/index.js';

export type SessionCommand =
  | { kind: 'quit' }
  | { kind: 'history' }
  | { kind: 'empty' }
  | { kind: 'request'; text: string };

const QUIT_COMMANDS = new Set(['quit', 'exit', 'bye', 'q']);

export function parseCommand(line: string): SessionCommand {
  const text = line.trim();
  const lower = text.toLowerCase();

  if (!text) return { kind: 'empty' };
  if (QUIT_COMMANDS.has(lower)) return { kind: 'quit' };
  if (lower === 'history') return { kind: 'history' };
  return { kind: 'request', text };
}

export interface SessionDriverOptions {
  input?: Readable;
  output?: Writable;
  /** Records shown by `history`. Default: 5 */
  historyLimit?: number;
}

export const PROMPT = '\n💬 Your request: ';
export const GOODBYE = '👋 Goodbye!';
export const INTERRUPTED = '⚠️  Interrupted. Ending session.';

export class SessionDriver {
  private coordinator: Coordinator;
  private context: ContextStore;
  private input: Readable;
  private output: Writable;
  private historyLimit: number;
  private controller = new AbortController();
  private lines?: Interface;

  constructor(coordinator: Coordinator, context: ContextStore, options: SessionDriverOptions = {}) {
    this.coordinator = coordinator;
    this.context = context;
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.historyLimit = options.historyLimit ?? DEFAULT_HISTORY_LIMIT;
  }

  /**
   * Run until quit, end of input, or interrupt.
   */
  async run(): Promise<void> {
    this.lines = createInterface({ input: this.input, terminal: false });
    this.write(PROMPT);

    try {
      for await (const line of this.lines) {
        if (this.controller.signal.aborted) break;

        const command = parseCommand(line);
        if (command.kind === 'quit') {
          this.print(GOODBYE);
          break;
        }

        if (command.kind === 'history') {
          this.print(`\n${summarizeHistory(this.context, this.historyLimit)}`);
        } else if (command.kind === 'request') {
          this.print('\n🤖 Coordinating agents...');
          const response = await this.coordinator.handle(command.text, this.context, this.controller.signal);
          this.print(`\n📋 Response:\n${response}`);
        }

        this.write(PROMPT);
      }
    } catch (error) {
      if (!(error instanceof UserInterrupt)) throw error;
    } finally {
      this.lines.close();
    }

    if (this.controller.signal.aborted) {
      this.print(`\n${INTERRUPTED}`);
    }
  }

  /**
   * Cancel the pending backend call (if any) and stop reading input.
   */
  interrupt(): void {
    this.controller.abort();
    this.lines?.close();
  }

  private print(text: string): void {
    this.write(`${text}\n`);
  }

  private write(text: string): void {
    this.output.write(text);
  }
}
