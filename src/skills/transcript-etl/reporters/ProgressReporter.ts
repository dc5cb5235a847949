import type { EtlProgress } from '../types.js';

const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  cyan: '\x1b[36m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
};

const fmt = (color: keyof typeof COLORS, text: string): string =>
  `${COLORS[color]}${text}${COLORS.reset}`;

const PHASE_LABELS: Record<EtlProgress['phase'], string> = {
  reading: 'Reading chat export',
  extracting: 'Extracting records',
  storing: 'Storing records',
};

export class ProgressReporter {
  private enabled: boolean;
  private lastLineLength: number = 0;

  constructor(
    enabled: boolean = true,
    private readonly out: NodeJS.WriteStream = process.stdout
  ) {
    this.enabled = enabled && Boolean(out.isTTY);
  }

  update(progress: EtlProgress): void {
    if (!this.enabled) return;

    this.clearLine();
    const counter = fmt('cyan', `[${progress.current}/${progress.total}]`);
    const label = PHASE_LABELS[progress.phase];
    const item = progress.currentItem ? fmt('dim', ` - chat ${progress.currentItem}`) : '';
    const line = `${counter} ${label}${item}`;
    this.out.write(line);
    this.lastLineLength = line.length;
  }

  complete(message: string): void {
    this.print(fmt('green', '✓'), message);
  }

  warn(message: string): void {
    this.print(fmt('yellow', '⚠'), message);
  }

  error(message: string): void {
    this.clearLine();
    this.out.write(`${fmt('red', '✗')} ${message}\n`);
  }

  private print(symbol: string, message: string): void {
    if (!this.enabled) return;
    this.clearLine();
    this.out.write(`${symbol} ${message}\n`);
  }

  private clearLine(): void {
    if (this.lastLineLength > 0) {
      this.out.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
      this.lastLineLength = 0;
    }
  }
}
