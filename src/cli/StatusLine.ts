// src/cli/StatusLine.ts

import pc from 'picocolors';
import type { StatusSink } from '../observability/types';

/**
 * Single-line spinner on stderr. Does nothing when the stream is not a
 * terminal, so piped output stays clean.
 */
export class StatusLine implements StatusSink {
  private frame = 0;
  private timer: ReturnType<typeof setInterval> | undefined;
  private spinners = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
  private text = '';
  private isRunning = false;

  constructor(private readonly stream: NodeJS.WriteStream = process.stderr) {}

  get enabled(): boolean {
    return Boolean(this.stream.isTTY);
  }

  update(text: string): void {
    this.text = text;
    if (!this.enabled) return;
    this.ensureRunning();
    this.render();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    if (this.isRunning) {
      this.clear();
    }
    this.isRunning = false;
  }

  private ensureRunning(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.timer = setInterval(() => this.render(), 80);
    // never keep the process alive for the spinner
    this.timer.unref();
  }

  private clear(): void {
    this.stream.write('\r\x1b[K');
  }

  private render(): void {
    if (!this.isRunning) return;

    this.frame++;
    const spinner = pc.cyan(this.spinners[this.frame % this.spinners.length]);
    const cols = this.stream.columns || 80;
    const text = this.text.length > cols - 3 ? `${this.text.slice(0, cols - 4)}…` : this.text;

    this.clear();
    this.stream.write(`${spinner} ${pc.dim(text)}`);
  }
}
