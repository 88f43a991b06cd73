export interface OutputSink {
  write(text: string): boolean;
}

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/** Prints text one character at a time. */
export class Typewriter {
  constructor(private readonly output: OutputSink, private readonly delayMs: number) {}

  async print(text: string, signal?: AbortSignal): Promise<void> {
    if (this.delayMs <= 0) {
      this.output.write(text);
      return;
    }
    // Iterating the string keeps surrogate pairs (emoji) together.
    for (const char of text) {
      if (signal?.aborted) return;
      this.output.write(char);
      await sleep(this.delayMs);
    }
  }
}
