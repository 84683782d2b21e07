import type { Server } from "http";
import type { Express } from "express";
import type { AuditEvent, DecisionRecord } from "@hopguard/audit";

export interface Running {
  url: string;
  server: Server;
}

const running: Server[] = [];

export async function listen(app: Express): Promise<Running> {
  const server = await new Promise<Server>((resolve) => {
    const s = app.listen(0, "127.0.0.1", () => resolve(s));
  });
  running.push(server);
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("no address");
  return { url: `http://127.0.0.1:${addr.port}`, server };
}

export async function closeAll(): Promise<void> {
  const servers = running.splice(0);
  await Promise.all(
    servers.map(
      (s) =>
        new Promise<void>((resolve) => {
          s.closeAllConnections();
          s.close(() => resolve());
        }),
    ),
  );
}

/** Sink that keeps every event; `decisions()` narrows to enforcement records. */
export function captureSink() {
  const events: AuditEvent[] = [];
  return {
    sink: (e: AuditEvent) => {
      events.push(e);
    },
    events,
    decisions: (): DecisionRecord[] => events.filter((e): e is DecisionRecord => e.kind === "hop.decision"),
  };
}
