// src/actor.ts

/**
 * A unique identifier for an actor.
 * - `systemId`: the router the actor runs on.
 * - `id`: the unique id of this actor incarnation.
 * - `name`: the optional registered name (e.g. `responder:<service-id>`).
 */
export class ActorId {
  constructor(
    public readonly systemId: string,
    public readonly id: string,
    public readonly name?: string,
  ) {}

  toString(): string {
    return this.name ? `${this.systemId}/${this.name}` : `${this.systemId}/${this.id}`;
  }
}

/**
 * Handle for a timer started with sendAfter() or sendInterval().
 */
export class TimerRef {
  constructor(
    public readonly id: string,
    public readonly actorId: string,
    public readonly isInterval: boolean,
  ) {}
}

export type TerminationReason =
  | { type: "normal" }
  | { type: "shutdown" }
  | { type: "error"; error: Error };

/**
 * Returned from handleCall() after deferReply(): the reply is completed
 * later through the DeferredReply instead of the return value.
 */
export const noReply: unique symbol = Symbol("noReply");
export type NoReply = typeof noReply;
export type CallResult<TReply> = TReply | NoReply;

/**
 * Single-use reply slot for a call.
 *
 * The caller's timeout abandons the slot, so an actor holding a deferred
 * reply can tell the caller is gone and skip the work it was about to hand
 * out.
 */
export class DeferredReply<T> {
  private state: "pending" | "resolved" | "rejected" | "abandoned" = "pending";

  constructor(
    private readonly onResolve: (value: T) => void,
    private readonly onReject: (error: Error) => void,
  ) {}

  get isPending(): boolean {
    return this.state === "pending";
  }

  get isAbandoned(): boolean {
    return this.state === "abandoned";
  }

  /** Returns false when the reply was already settled or abandoned. */
  resolve(value: T): boolean {
    if (this.state !== "pending") {
      return false;
    }
    this.state = "resolved";
    this.onResolve(value);
    return true;
  }

  reject(error: Error): boolean {
    if (this.state !== "pending") {
      return false;
    }
    this.state = "rejected";
    this.onReject(error);
    return true;
  }

  abandon(): boolean {
    if (this.state !== "pending") {
      return false;
    }
    this.state = "abandoned";
    return true;
  }
}

/**
 * The delivery side of an actor, implemented by the actor system.
 */
export interface MailboxPort<TCast, TCall, TReply> {
  call(message: TCall, timeout: number): Promise<TReply>;
  cast(message: TCast): boolean;
  isAlive(): boolean;
}

/**
 * A reference to an actor, used to send it messages.
 *
 * @template TCast fire-and-forget messages the actor accepts
 * @template TCall request/reply messages the actor accepts
 * @template TReply replies the actor returns for calls
 */
export class ActorRef<TCast, TCall, TReply> {
  constructor(
    public readonly id: ActorId,
    private readonly port: MailboxPort<TCast, TCall, TReply>,
  ) {}

  /**
   * Sends a call and waits for the reply.
   * @throws TimeoutError when no reply arrives within `timeout` ms
   */
  call(message: TCall, timeout = 5000): Promise<TReply> {
    return this.port.call(message, timeout);
  }

  /**
   * Sends a cast. Returns false when the message was dropped because the
   * actor stopped or its mailbox is full.
   */
  cast(message: TCast): boolean {
    return this.port.cast(message);
  }

  isAlive(): boolean {
    return this.port.isAlive();
  }
}

/**
 * Runtime services the actor system provides to a running actor.
 */
export interface ActorContext<TCast, TReply> {
  scheduleAfter(message: TCast, delayMs: number): TimerRef;
  scheduleInterval(message: TCast, intervalMs: number): TimerRef;
  cancelTimer(ref: TimerRef): boolean;
  cancelAllTimers(): void;
  deferCurrentReply(): DeferredReply<TReply>;
}

/**
 * Base class for actors. Messages are handled one at a time in arrival
 * order; a handler that throws has its message dropped and the actor keeps
 * running.
 */
export abstract class Actor<TCast = never, TCall = never, TReply = never> {
  public self!: ActorRef<TCast, TCall, TReply>;
  public context!: ActorContext<TCast, TReply>;

  /**
   * Runs before the first message is delivered.
   */
  init(): void | Promise<void> {}

  /**
   * Runs once when the actor stops, after its timers are cancelled.
   */
  terminate(_reason: TerminationReason): void | Promise<void> {}

  handleCall(message: TCall): CallResult<TReply> | Promise<CallResult<TReply>> {
    throw new Error(`${this.constructor.name} does not handle calls: ${JSON.stringify(message)}`);
  }

  handleCast(message: TCast): void | Promise<void> {
    throw new Error(`${this.constructor.name} does not handle casts: ${JSON.stringify(message)}`);
  }

  /**
   * Takes ownership of the reply to the call being handled. The handler
   * must then return `noReply`.
   */
  protected deferReply(): DeferredReply<TReply> {
    return this.context.deferCurrentReply();
  }

  /**
   * Casts `message` to this actor after `delayMs`.
   */
  protected sendAfter(message: TCast, delayMs: number): TimerRef {
    return this.context.scheduleAfter(message, delayMs);
  }

  /**
   * Casts `message` to this actor every `intervalMs` until cancelled.
   */
  protected sendInterval(message: TCast, intervalMs: number): TimerRef {
    return this.context.scheduleInterval(message, intervalMs);
  }

  protected cancelTimer(ref: TimerRef): boolean {
    return this.context.cancelTimer(ref);
  }

  protected cancelAllTimers(): void {
    this.context.cancelAllTimers();
  }
}
