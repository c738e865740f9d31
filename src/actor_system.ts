// src/actor_system.ts

import { v4 as uuidv4 } from "uuid";
import {
  Actor,
  ActorContext,
  ActorId,
  ActorRef,
  CallResult,
  DeferredReply,
  MailboxPort,
  TerminationReason,
  TimerRef,
  noReply,
} from "./actor";
import {
  ActorStoppedError,
  DuplicateActorNameError,
  MailboxFullError,
  ShuttingDownError,
  TimeoutError,
  toError,
} from "./errors";
import { ComponentHealth, HealthCheckable } from "./health";
import { Logger, createLogger } from "./logger";

export interface SpawnOptions<TArgs extends unknown[]> {
  /** Registered name, unique within the system. */
  name?: string;
  /** Constructor arguments for the actor class. */
  args: TArgs;
  mailboxCapacity?: number;
}

export interface ActorSystemOptions {
  mailboxCapacity?: number;
}

export interface ShutdownOptions {
  /** Upper bound for draining and for stopping, each (default 5000ms). */
  timeout?: number;
  /** Let actors finish their queued messages before stopping (default true). */
  drainMailboxes?: boolean;
}

type Envelope<TCast, TCall, TReply> =
  | { kind: "cast"; message: TCast }
  | { kind: "call"; message: TCall; reply: DeferredReply<TReply> };

interface ExitSignal {
  reason: TerminationReason;
  done: () => void;
}

/**
 * What the system needs to know about a cell, independent of its message
 * types.
 */
interface ActorCellHandle {
  readonly id: ActorId;
  mailboxSize(): number;
  isIdle(): boolean;
  stop(reason: TerminationReason): Promise<void>;
}

/**
 * Runtime state of one actor: its bounded mailbox, the control lane for
 * exit signals, and its timers.
 */
class ActorCell<TCast, TCall, TReply>
  implements MailboxPort<TCast, TCall, TReply>, ActorContext<TCast, TReply>, ActorCellHandle
{
  readonly ref: ActorRef<TCast, TCall, TReply>;
  private readonly mailbox: Envelope<TCast, TCall, TReply>[] = [];
  private readonly control: ExitSignal[] = [];
  private readonly timers = new Map<string, { ref: TimerRef; handle: NodeJS.Timeout }>();
  private status: "starting" | "running" | "stopped" = "starting";
  private exiting?: Promise<void>;
  private processing = false;
  private currentReply?: DeferredReply<TReply>;
  private replyDeferred = false;

  constructor(
    readonly id: ActorId,
    private readonly actor: Actor<TCast, TCall, TReply>,
    private readonly capacity: number,
    private readonly log: Logger,
    private readonly onStopped: (cell: ActorCellHandle) => void,
  ) {
    this.ref = new ActorRef(id, this);
    actor.self = this.ref;
    actor.context = this;
  }

  start(): void {
    this.schedule();
  }

  isAlive(): boolean {
    return this.status !== "stopped" && this.exiting === undefined;
  }

  mailboxSize(): number {
    return this.mailbox.length;
  }

  isIdle(): boolean {
    return this.mailbox.length === 0 && !this.processing;
  }

  call(message: TCall, timeout: number): Promise<TReply> {
    return new Promise<TReply>((resolve, reject) => {
      if (!this.isAlive()) {
        reject(new ActorStoppedError(this.id.toString()));
        return;
      }
      if (this.mailbox.length >= this.capacity) {
        this.log.warn("Mailbox full, rejecting call", { capacity: this.capacity });
        reject(new MailboxFullError(this.id.toString(), this.capacity));
        return;
      }

      let timer: NodeJS.Timeout | undefined;
      const reply = new DeferredReply<TReply>(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (error) => {
          clearTimeout(timer);
          reject(error);
        },
      );
      timer = setTimeout(() => {
        if (reply.abandon()) {
          reject(new TimeoutError(`call to ${this.id}`, timeout));
        }
      }, timeout);

      this.mailbox.push({ kind: "call", message, reply });
      this.schedule();
    });
  }

  cast(message: TCast): boolean {
    if (!this.isAlive()) {
      this.log.debug("Dropping cast to stopped actor");
      return false;
    }
    if (this.mailbox.length >= this.capacity) {
      this.log.warn("Mailbox full, dropping cast", { capacity: this.capacity });
      return false;
    }
    this.mailbox.push({ kind: "cast", message });
    this.schedule();
    return true;
  }

  scheduleAfter(message: TCast, delayMs: number): TimerRef {
    const ref = new TimerRef(uuidv4(), this.id.id, false);
    const handle = setTimeout(() => {
      this.timers.delete(ref.id);
      this.cast(message);
    }, delayMs);
    this.timers.set(ref.id, { ref, handle });
    return ref;
  }

  scheduleInterval(message: TCast, intervalMs: number): TimerRef {
    const ref = new TimerRef(uuidv4(), this.id.id, true);
    const handle = setInterval(() => this.cast(message), intervalMs);
    this.timers.set(ref.id, { ref, handle });
    return ref;
  }

  cancelTimer(ref: TimerRef): boolean {
    const entry = this.timers.get(ref.id);
    if (!entry) {
      return false;
    }
    if (entry.ref.isInterval) {
      clearInterval(entry.handle);
    } else {
      clearTimeout(entry.handle);
    }
    this.timers.delete(ref.id);
    return true;
  }

  cancelAllTimers(): void {
    for (const { ref } of Array.from(this.timers.values())) {
      this.cancelTimer(ref);
    }
  }

  deferCurrentReply(): DeferredReply<TReply> {
    if (!this.currentReply) {
      throw new Error("deferReply() can only be used while handling a call");
    }
    this.replyDeferred = true;
    return this.currentReply;
  }

  stop(reason: TerminationReason): Promise<void> {
    if (!this.exiting) {
      this.exiting = new Promise<void>((done) => {
        this.control.push({ reason, done });
      });
      this.schedule();
    }
    return this.exiting;
  }

  private schedule(): void {
    if (this.processing || this.status === "stopped") {
      return;
    }
    this.processing = true;
    queueMicrotask(() => {
      void this.drain();
    });
  }

  /**
   * Processes messages until the mailbox is empty. Exit signals are checked
   * before every message, so a stop takes effect after the handler that is
   * currently running.
   */
  private async drain(): Promise<void> {
    try {
      if (this.status === "starting") {
        try {
          await this.actor.init();
        } catch (err) {
          this.log.error("Actor init failed", err);
        }
        this.status = "running";
      }

      for (;;) {
        const signal = this.control.shift();
        if (signal) {
          await this.exit(signal);
          return;
        }
        const envelope = this.mailbox.shift();
        if (!envelope) {
          return;
        }
        await this.deliver(envelope);
      }
    } finally {
      this.processing = false;
    }
  }

  private async deliver(envelope: Envelope<TCast, TCall, TReply>): Promise<void> {
    if (envelope.kind === "cast") {
      try {
        await this.actor.handleCast(envelope.message);
      } catch (err) {
        this.log.error("Error handling cast, message dropped", err);
      }
      return;
    }

    const { reply } = envelope;
    if (!reply.isPending) {
      this.log.debug("Skipping call whose caller has given up");
      return;
    }

    this.currentReply = reply;
    this.replyDeferred = false;
    const handled = new Promise<CallResult<TReply>>((resolve) => {
      resolve(this.actor.handleCall(envelope.message));
    });
    await handled.then(
      (result) => this.complete(reply, result),
      (err: unknown) => {
        this.log.warn("Error handling call", { error: toError(err).message });
        if (!this.replyDeferred) {
          reply.reject(toError(err));
        }
      },
    );
    this.currentReply = undefined;
    this.replyDeferred = false;
  }

  private complete(reply: DeferredReply<TReply>, result: CallResult<TReply>): void {
    if (this.replyDeferred) {
      return;
    }
    if (result === noReply) {
      this.log.error("handleCall returned noReply without deferring the reply");
      reply.reject(new Error(`No reply from ${this.id}`));
      return;
    }
    reply.resolve(result);
  }

  private async exit(signal: ExitSignal): Promise<void> {
    this.cancelAllTimers();
    try {
      await this.actor.terminate(signal.reason);
    } catch (err) {
      this.log.error("Actor terminate failed", err);
    }

    const stopped = new ActorStoppedError(this.id.toString());
    for (const envelope of this.mailbox.splice(0)) {
      if (envelope.kind === "call") {
        envelope.reply.reject(stopped);
      }
    }

    this.status = "stopped";
    this.onStopped(this);
    this.log.debug("Actor stopped", { reason: signal.reason.type });
    signal.done();
  }
}

/**
 * Hosts the router's actors: one Responder per service, the work-stealing
 * balancer and the interstitial maintainer.
 */
export class ActorSystem implements HealthCheckable {
  readonly id: string;
  private readonly cells = new Map<string, ActorCellHandle>();
  private readonly names = new Map<string, ActorCellHandle>();
  private readonly mailboxCapacity: number;
  private readonly log: Logger;
  private shuttingDown = false;

  constructor(routerId: string, options: ActorSystemOptions = {}) {
    this.id = routerId;
    this.mailboxCapacity = options.mailboxCapacity ?? 1024;
    this.log = createLogger("ActorSystem", routerId);
  }

  /**
   * Constructs and starts an actor.
   * @throws DuplicateActorNameError when `options.name` is taken
   * @throws ShuttingDownError after shutdown() has begun
   */
  spawn<TCast, TCall, TReply, TArgs extends unknown[]>(
    actorClass: new (...args: TArgs) => Actor<TCast, TCall, TReply>,
    options: SpawnOptions<TArgs>,
  ): ActorRef<TCast, TCall, TReply> {
    if (this.shuttingDown) {
      throw new ShuttingDownError("spawn actor");
    }
    if (options.name !== undefined && this.names.has(options.name)) {
      throw new DuplicateActorNameError(options.name);
    }

    const actor = new actorClass(...options.args);
    const id = new ActorId(this.id, uuidv4(), options.name);
    const cell = new ActorCell(
      id,
      actor,
      options.mailboxCapacity ?? this.mailboxCapacity,
      this.log.child({ actorId: id.toString() }),
      (stopped) => this.unregister(stopped),
    );

    this.cells.set(id.id, cell);
    if (options.name !== undefined) {
      this.names.set(options.name, cell);
    }
    cell.start();
    this.log.debug("Spawned actor", { actorId: id.toString(), actorClass: actorClass.name });
    return cell.ref;
  }

  isRegistered(name: string): boolean {
    return this.names.has(name);
  }

  /**
   * Stops an actor; resolves once its terminate() has run.
   */
  async stop(ref: { id: ActorId }, reason: TerminationReason = { type: "normal" }): Promise<void> {
    const cell = this.cells.get(ref.id.id);
    if (!cell) {
      return;
    }
    await cell.stop(reason);
  }

  getLocalActorIds(): string[] {
    return Array.from(this.cells.values()).map((cell) => cell.id.toString());
  }

  isShuttingDown(): boolean {
    return this.shuttingDown;
  }

  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    const { timeout = 5000, drainMailboxes = true } = options;
    if (this.shuttingDown) {
      return;
    }
    this.shuttingDown = true;
    this.log.info("Shutting down actor system", { actorCount: this.cells.size });

    if (drainMailboxes) {
      const drained = await this.waitUntil(
        () => Array.from(this.cells.values()).every((cell) => cell.isIdle()),
        timeout,
      );
      if (!drained) {
        this.log.warn("Mailbox drain timed out", { timeout });
      }
    }

    const stopAll = Promise.all(
      Array.from(this.cells.values()).map((cell) => cell.stop({ type: "shutdown" })),
    ).then(() => true);
    const stopped = await Promise.race([stopAll, this.delay(timeout).then(() => false)]);
    if (!stopped) {
      this.log.warn("Some actors did not stop in time", { remaining: this.cells.size });
    }
    this.log.info("Actor system shut down");
  }

  getHealth(): ComponentHealth {
    let totalMailboxSize = 0;
    for (const cell of this.cells.values()) {
      totalMailboxSize += cell.mailboxSize();
    }
    return {
      name: "ActorSystem",
      status: this.shuttingDown ? "degraded" : "healthy",
      message: this.shuttingDown ? "Shutting down" : undefined,
      details: {
        actorCount: this.cells.size,
        namedActorCount: this.names.size,
        totalMailboxSize,
      },
    };
  }

  private unregister(cell: ActorCellHandle): void {
    this.cells.delete(cell.id.id);
    if (cell.id.name !== undefined && this.names.get(cell.id.name) === cell) {
      this.names.delete(cell.id.name);
    }
  }

  private async waitUntil(condition: () => boolean, timeout: number): Promise<boolean> {
    const deadline = Date.now() + timeout;
    while (!condition()) {
      if (Date.now() >= deadline) {
        return false;
      }
      await this.delay(10);
    }
    return true;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => {
      setTimeout(resolve, ms).unref();
    });
  }
}
