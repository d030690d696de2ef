import { BulkheadRejectedError, bulkhead, type BulkheadPolicy } from "cockatiel";
import type { OutputEvent } from "../types/Events.js";
import type { TurnStream } from "../engine/TurnEngine.js";
import { silentLogger, type Logger } from "../observability/Logger.js";

export interface ConversationGateOptions {
  /** Turns allowed to wait behind the running one (default: 8) */
  maxQueued?: number;
  logger?: Logger;
}

interface Lane {
  policy: BulkheadPolicy;
  users: number;
}

/**
 * Serializes turns of the same conversation; different conversations run
 * independently. Each conversation gets a one-slot bulkhead with a bounded
 * queue, dropped again once nobody is using it.
 */
export class ConversationGate {
  private readonly lanes = new Map<string, Lane>();
  private readonly maxQueued: number;
  private readonly logger: Logger;

  constructor(options: ConversationGateOptions = {}) {
    this.maxQueued = options.maxQueued ?? 8;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run the turn produced by `open` once every earlier turn of the
   * conversation has finished. A full queue yields a single
   * `CONVERSATION_BUSY` error event instead.
   */
  async *run(
    conversationId: string,
    open: () => TurnStream,
  ): AsyncGenerator<OutputEvent, void, undefined> {
    const lane = this.enter(conversationId);
    let release: (() => void) | undefined;
    let stream: TurnStream | undefined;
    try {
      release = await this.acquire(lane);
      if (!release) {
        this.logger.warn("conversation.busy", { conversationId });
        yield {
          type: "error",
          kind: "CONVERSATION_BUSY",
          message: `Conversation ${conversationId} has too many pending messages; retry later`,
        };
        return;
      }
      stream = open();
      yield* stream;
    } finally {
      // The slot is held until the turn stops writing history, not until
      // the consumer stops reading.
      const settle = () => {
        release?.();
        this.leave(conversationId, lane);
      };
      if (stream) {
        stream.finished.then(settle, settle);
      } else {
        settle();
      }
    }
  }

  /** Conversations with a running or queued turn. */
  get activeConversations(): number {
    return this.lanes.size;
  }

  private enter(conversationId: string): Lane {
    let lane = this.lanes.get(conversationId);
    if (!lane) {
      lane = { policy: bulkhead(1, this.maxQueued), users: 0 };
      this.lanes.set(conversationId, lane);
    }
    lane.users++;
    return lane;
  }

  private leave(conversationId: string, lane: Lane): void {
    lane.users--;
    if (lane.users === 0 && this.lanes.get(conversationId) === lane) {
      this.lanes.delete(conversationId);
    }
  }

  /**
   * Resolves with a release function once the slot is held, or undefined
   * when the bulkhead queue is full.
   */
  private acquire(lane: Lane): Promise<(() => void) | undefined> {
    return new Promise((resolve, reject) => {
      lane.policy
        .execute(
          () =>
            new Promise<void>((done) => {
              resolve(() => done());
            }),
        )
        .catch((error: unknown) => {
          if (error instanceof BulkheadRejectedError) {
            resolve(undefined);
          } else {
            reject(error);
          }
        });
    });
  }
}
