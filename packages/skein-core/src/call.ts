import type { Channel } from "./channel.ts";
import type { Logger } from "./logging.ts";
import type { MethodShape } from "./service.ts";

type Outcome<R> = { ok: true; value: R } | { ok: false; error: Error };

/**
 * One in-flight remote invocation.
 *
 * A call settles exactly once, either with a reply or an error, and is then
 * delivered on its `done` channel. `seq` is 0n until the call is written.
 */
export class Call<R = unknown> {
  seq = 0n;
  private outcome: Outcome<R> | null = null;
  private listeners: Array<() => void> = [];

  constructor(
    readonly serviceMethod: string,
    readonly args: unknown,
    readonly shape: MethodShape,
    readonly done: Channel<Call<R>>,
    private readonly logger: Logger,
  ) {}

  get settled(): boolean {
    return this.outcome !== null;
  }

  /** Decoded reply; undefined until the call succeeds. */
  get reply(): R | undefined {
    const outcome = this.outcome;
    return outcome !== null && outcome.ok === true ? outcome.value : undefined;
  }

  /** Error the call settled with, or null. */
  get error(): Error | null {
    const outcome = this.outcome;
    return outcome !== null && outcome.ok === false ? outcome.error : null;
  }

  /** The reply, or throw the error the call failed with. */
  unwrap(): R {
    const outcome = this.outcome;
    if (outcome === null) {
      throw new Error(`${this.serviceMethod}: call has not settled`);
    }
    if (outcome.ok === false) throw outcome.error;
    return outcome.value;
  }

  /** Run `listener` once the call settles (immediately if it already has). */
  whenSettled(listener: () => void): void {
    if (this.outcome !== null) {
      listener();
    } else {
      this.listeners.push(listener);
    }
  }

  resolve(value: R): boolean {
    return this.settle({ ok: true, value });
  }

  reject(error: Error): boolean {
    return this.settle({ ok: false, error });
  }

  private settle(outcome: Outcome<R>): boolean {
    if (this.outcome !== null) return false;
    this.outcome = outcome;

    if (!this.done.send(this)) {
      // the caller sized the channel; a full one drops the completion
      this.logger.debug("completion dropped: done channel full or closed", {
        serviceMethod: this.serviceMethod,
        seq: this.seq.toString(),
      });
    }

    const listeners = this.listeners;
    this.listeners = [];
    for (const listener of listeners) {
      try {
        listener();
      } catch (e) {
        this.logger.warn("call listener failed", {
          serviceMethod: this.serviceMethod,
          error: e instanceof Error ? e.message : String(e),
        });
      }
    }
    return true;
  }
}
