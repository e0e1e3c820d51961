import type { Logger } from "@/lib/logger";

const ABORTED = Symbol("aborted");

/**
 * Forwards every fragment of a source stream while keeping a copy of the text.
 * `completed` only turns true once the source has been drained to its end.
 *
 * Cancellation does not wait for the source: a pending read is abandoned as soon
 * as the signal fires, and the source is closed once that read settles.
 */
export class StreamCollector {
  private readonly parts: string[] = [];
  private drained = false;

  constructor(
    private readonly source: AsyncIterable<string>,
    private readonly logger?: Logger,
  ) {}

  get completed(): boolean {
    return this.drained;
  }

  get text(): string {
    return this.parts.join("");
  }

  async *forward(signal?: AbortSignal): AsyncGenerator<string, void, undefined> {
    if (signal?.aborted) {
      return;
    }

    const iterator = this.source[Symbol.asyncIterator]();
    let resolveAborted: (value: typeof ABORTED) => void = () => undefined;
    const aborted = new Promise<typeof ABORTED>((resolve) => {
      resolveAborted = resolve;
    });
    const onAbort = () => resolveAborted(ABORTED);
    let abandoned = false;

    signal?.addEventListener("abort", onAbort, { once: true });

    try {
      for (;;) {
        const pending = iterator.next();
        const result = await Promise.race([pending, aborted]);

        if (result === ABORTED || signal?.aborted) {
          abandoned = true;
          void this.abandon(pending, iterator);
          return;
        }

        if (result.done) {
          this.drained = true;
          return;
        }

        this.parts.push(result.value);
        yield result.value;
      }
    } finally {
      signal?.removeEventListener("abort", onAbort);

      if (!this.drained && !abandoned) {
        await iterator.return?.();
      }
    }
  }

  /** Waits out a read nobody consumes any more, then closes the source. */
  private async abandon(pending: Promise<IteratorResult<string>>, iterator: AsyncIterator<string>): Promise<void> {
    try {
      await pending;
      await iterator.return?.();
    } catch (error) {
      this.logger?.debug({ err: error }, "source failed after cancellation");
    }
  }
}
