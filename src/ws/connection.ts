import { errorMessage, WorkerEscalation } from "../core/errors.js";
import {
  CLIENT_MESSAGE_TYPES,
  clientMessageSchema,
  ERROR_MESSAGES,
  EventSink,
  ServerEvent,
} from "../core/protocol.js";
import { SearchSession } from "../core/search-session.js";
import { Logger, createLogger } from "../logger.js";

const OPEN = 1;

/** Close code sent when the session hit a failure it could not absorb. */
export const INTERNAL_ERROR_CLOSE_CODE = 1011;

/** The slice of a `ws` socket a connection writes to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SessionFactory = (
  sessionId: string,
  sink: EventSink,
  onEscalate: (error: WorkerEscalation) => void,
) => SearchSession;

function declaredType(value: unknown): string | null {
  if (typeof value !== "object" || value === null || !("type" in value)) return null;
  return typeof value.type === "string" ? value.type : null;
}

/** Binds one socket to one search session for the socket's lifetime. */
export class ClientConnection {
  readonly session: SearchSession;
  private closed = false;
  private log: Logger;

  constructor(
    readonly id: string,
    private socket: ClientSocket,
    createSession: SessionFactory,
    logger?: Logger,
  ) {
    this.log = logger ?? createLogger("ws");
    this.session = createSession(
      id,
      (event) => this.deliver(event),
      (error) => this.escalate(error),
    );
  }

  get isClosed(): boolean {
    return this.closed;
  }

  receive(raw: string): void {
    if (this.closed) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn("Dropping unparseable frame", { connectionId: this.id, error: errorMessage(err) });
      this.rejectFrame();
      return;
    }

    const type = declaredType(parsed);
    if (type !== null && !CLIENT_MESSAGE_TYPES.includes(type)) {
      this.log.warn(`Ignoring unknown message type: ${type}`, { connectionId: this.id });
      return;
    }

    const result = clientMessageSchema.safeParse(parsed);
    if (!result.success) {
      this.log.warn("Dropping invalid frame", {
        connectionId: this.id,
        issues: result.error.issues.map((issue) => issue.message),
      });
      this.rejectFrame();
      return;
    }

    this.session.handle(result.data);
  }

  /** Called when the socket went away; idempotent. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.session.close();
  }

  private rejectFrame(): void {
    this.deliver({ type: "error", data: { message: ERROR_MESSAGES.invalidMessage, fatal: false } });
  }

  private deliver(event: ServerEvent): void {
    if (this.closed || this.socket.readyState !== OPEN) {
      this.log.debug(`Socket not open, dropping ${event.type} event`, { connectionId: this.id });
      return;
    }
    this.socket.send(JSON.stringify(event));
  }

  private escalate(error: WorkerEscalation): void {
    this.log.error(`Closing connection after escalation: ${error.message}`, { connectionId: this.id });
    this.deliver({ type: "error", data: { message: `Internal error: ${error.message}`, fatal: true } });
    this.close();
    this.socket.close(INTERNAL_ERROR_CLOSE_CODE, "Internal error");
  }
}
