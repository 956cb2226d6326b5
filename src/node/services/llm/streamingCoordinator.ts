import { EventEmitter } from "events";
import { randomUUID } from "crypto";
import {
  createAsyncMessageQueue,
  type AsyncMessageQueue,
} from "@/common/utils/asyncMessageQueue";
import { getErrorMessage } from "@/common/utils/errors";
import { log } from "@/node/services/log";
import type { CompletionSource } from "./llmHttpClient";
import type { GenerationRequest } from "./types";

export type GenerationStatus = "completed" | "failed" | "cancelled";

export interface GenerationResult {
  status: GenerationStatus;
  /** Everything delivered before the job ended, even when it failed */
  text: string;
  error?: Error;
}

/**
 * One generation running in the background.
 *
 * Events, each emitted at most once except "token":
 * - "token" (chunk: string), in arrival order
 * - "finished" (text: string)
 * - "failed" (error: Error)
 * - "cancelled" (text: string)
 */
export class GenerationJob extends EventEmitter {
  readonly id = randomUUID();
  /** Settles when the job ends; never rejects. */
  readonly done: Promise<GenerationResult>;

  private readonly controller = new AbortController();
  private readonly queue: AsyncMessageQueue<string> = createAsyncMessageQueue<string>();
  private text = "";

  constructor(
    private readonly source: CompletionSource,
    private readonly request: GenerationRequest
  ) {
    super();
    this.done = this.execute();
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * Chunks as an async iterable. Ends when the job completes or is
   * cancelled; throws the job's error after delivering what arrived first.
   * Single consumer.
   */
  chunks(): AsyncGenerator<string> {
    return this.queue.iterate();
  }

  /** Abort the underlying request. No-op once the job has ended. */
  cancel(): void {
    if (this.queue.closed || this.controller.signal.aborted) return;
    log.debug(`[llm/job] cancelling ${this.id}`);
    this.controller.abort();
  }

  private async execute(): Promise<GenerationResult> {
    try {
      if (this.request.stream) {
        for await (const chunk of this.source.generateStream(this.request, this.controller.signal)) {
          this.deliver(chunk);
        }
      } else {
        const content = await this.source.generate(this.request, this.controller.signal);
        if (content) this.deliver(content);
      }
    } catch (err) {
      if (this.controller.signal.aborted) {
        return this.settleCancelled();
      }
      const error = err instanceof Error ? err : new Error(getErrorMessage(err));
      log.debug(`[llm/job] ${this.id} failed: ${error.message}`);
      this.queue.fail(error);
      this.emit("failed", error);
      return { status: "failed", text: this.text, error };
    }

    if (this.controller.signal.aborted) {
      return this.settleCancelled();
    }
    this.queue.end();
    this.emit("finished", this.text);
    return { status: "completed", text: this.text };
  }

  private deliver(chunk: string): void {
    // Chunks that race a cancel are dropped
    if (this.controller.signal.aborted) return;
    this.text += chunk;
    this.queue.push(chunk);
    this.emit("token", chunk);
  }

  private settleCancelled(): GenerationResult {
    this.queue.end();
    this.emit("cancelled", this.text);
    return { status: "cancelled", text: this.text };
  }
}

/**
 * Runs generations off the caller's path. Jobs are independent; nothing
 * orders one request relative to another.
 */
export class StreamingCoordinator {
  private readonly active = new Map<string, GenerationJob>();

  constructor(private readonly source: CompletionSource) {}

  run(request: GenerationRequest): GenerationJob {
    const job = new GenerationJob(this.source, request);
    this.active.set(job.id, job);
    void job.done.then(() => this.active.delete(job.id));
    return job;
  }

  get activeCount(): number {
    return this.active.size;
  }

  cancelAll(): void {
    for (const job of this.active.values()) {
      job.cancel();
    }
  }
}
