import type { FastifyReply } from "fastify";
import type { BrokerEvent } from "@gpubroker/shared";

interface Client {
  reply: FastifyReply;
  /** Only events about this job, when set. */
  jobId: string | null;
}

/**
 * Holds open SSE connections and writes broker events to them, with a
 * periodic heartbeat while any client is connected.
 */
export class SSEManager {
  private clients = new Set<Client>();
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private heartbeatMs: number = 15_000,
    private now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.clients.size;
  }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.heartbeat(), this.heartbeatMs);
  }

  stop() {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  addClient(reply: FastifyReply, jobId: string | null = null) {
    const client: Client = { reply, jobId };
    this.clients.add(client);

    this.sendRawEvent(reply, { type: "heartbeat", data: { timestamp: this.now() } });
    this.start();

    reply.raw.on("close", () => {
      this.clients.delete(client);
      if (this.clients.size === 0) this.stop();
    });
  }

  broadcast(event: BrokerEvent) {
    const jobId = eventJobId(event);
    for (const client of this.clients) {
      if (client.jobId !== null && jobId !== null && client.jobId !== jobId) continue;
      this.sendRawEvent(client.reply, event);
    }
  }

  private heartbeat() {
    this.broadcast({ type: "heartbeat", data: { timestamp: this.now() } });
  }

  private sendRawEvent(reply: FastifyReply, event: BrokerEvent) {
    if (reply.raw.destroyed) return;
    reply.raw.write(`event: ${event.type}\ndata: ${JSON.stringify(event.data)}\n\n`);
  }
}

function eventJobId(event: BrokerEvent): string | null {
  switch (event.type) {
    case "job-transition":
    case "job-update":
    case "recommendation":
      return event.data.jobId;
    default:
      return null;
  }
}
