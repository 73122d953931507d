import readline from 'readline/promises';

export interface ConfirmPrompt {
  confirm(question: string): Promise<boolean>;
  close(): void;
}

const DECLINES = ['n', 'no', 'non'];

/**
 * Anything but an explicit no (including an empty answer) means yes.
 */
export const isDecline = (answer: string): boolean => DECLINES.includes(answer.trim().toLowerCase());

/**
 * Asks on the terminal. Once the input has ended every further question is
 * answered with a decline.
 */
export class ConsolePrompt implements ConfirmPrompt {
  private rl: readline.Interface | null = null;
  private inputClosed: Promise<null> = Promise.resolve(null);
  private ended = false;

  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async confirm(question: string): Promise<boolean> {
    if (this.ended) return false;
    const rl = this.rl ?? this.open();
    const answer = rl.question(question).catch((error: unknown) => {
      if (this.ended) return null;
      throw error;
    });
    const reply = await Promise.race([answer, this.inputClosed]);
    return reply !== null && !isDecline(reply);
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
  }

  private open(): readline.Interface {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    this.inputClosed = new Promise((resolve) => {
      rl.once('close', () => {
        this.ended = true;
        resolve(null);
      });
    });
    this.rl = rl;
    return rl;
  }
}
