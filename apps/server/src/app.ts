import Fastify, { type FastifyBaseLogger, type FastifyInstance, type FastifyReply } from "fastify";
import fastifyWebsocket from "@fastify/websocket";
import type { WebSocket } from "ws";
import type { AppConfig, StreamEnvelope } from "@perfscope/contracts";
import {
  DEFAULT_CONFIG_PATH,
  TraceSessionManager,
  UNKNOWN_SESSION_PREFIX,
  asRecord,
  discoverTraceFiles,
  loadConfig,
  mergeConfig,
  parseAllocationGroupBy,
  parseGroupByMode,
  parseLanes,
  toFiniteNumber,
  type EventFilter,
  type TraceSession,
} from "@perfscope/core";

const INVALID_PARAMETER_PREFIX = "invalid parameter:";

export interface CreateServerOptions {
  config?: AppConfig;
  sessions?: TraceSessionManager;
}

interface TraceParams {
  id: string;
}

type QueryOf<K extends string> = Partial<Record<K, string>>;

function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function statusFor(message: string): number {
  return message.startsWith(UNKNOWN_SESSION_PREFIX) ? 404 : 400;
}

function numberParam(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new Error(`${INVALID_PARAMETER_PREFIX} ${name} must be a number`);
  }
  return parsed;
}

function intParam(value: string | undefined, name: string): number | undefined {
  const parsed = numberParam(value, name);
  return parsed === undefined ? undefined : Math.trunc(parsed);
}

function boolParam(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

/** `"0,2,1"` to `[0, 2, 1]`; an empty or absent path is the root. */
function pathParam(value: string | undefined): number[] {
  if (!value || value.trim() === "") return [];
  return value.split(",").map((part) => {
    const step = Number(part.trim());
    if (!Number.isInteger(step)) {
      throw new Error(`${INVALID_PARAMETER_PREFIX} path must be comma-separated integers`);
    }
    return step;
  });
}

function requiredParam(value: string | undefined, name: string): string {
  if (value === undefined || value.trim() === "") {
    throw new Error(`${INVALID_PARAMETER_PREFIX} ${name} is required`);
  }
  return value;
}

async function respond<T>(
  reply: FastifyReply,
  log: FastifyBaseLogger,
  run: () => T | Promise<T>,
): Promise<T | { error: string }> {
  try {
    return await run();
  } catch (error) {
    const message = asErrorMessage(error);
    log.debug({ err: error }, message);
    reply.code(statusFor(message));
    return { error: message };
  }
}

function send(socket: WebSocket, envelope: StreamEnvelope): void {
  if (socket.readyState !== socket.OPEN) return;
  socket.send(JSON.stringify(envelope));
}

function socketFilter(value: unknown): EventFilter {
  const raw = asRecord(value);
  const filter: EventFilter = {};
  const from = toFiniteNumber(raw.from);
  if (from !== null) filter.from = from;
  const to = toFiniteNumber(raw.to);
  if (to !== null) filter.to = to;
  if (typeof raw.provider === "string" && raw.provider) filter.provider = raw.provider;
  if (typeof raw.type === "string" && raw.type) filter.type = raw.type;
  return filter;
}

async function streamChannel(
  socket: WebSocket,
  session: TraceSession,
  channel: string,
  filter: EventFilter,
  signal: AbortSignal,
): Promise<void> {
  switch (channel) {
    case "events":
      await session.exportEvents(
        filter,
        {
          event: (data) => send(socket, { type: "event", data }),
          progress: (count) => send(socket, { type: "progress", count, message: `streamed ${count} events` }),
        },
        signal,
      );
      break;
    case "gc": {
      const gcs = session.getGcStats({ timeline: true, from: filter.from, to: filter.to }).timeline ?? [];
      for (const gc of gcs) {
        if (signal.aborted) break;
        send(socket, { type: "event", channel: "gc", data: gc });
      }
      break;
    }
    default:
      send(socket, { type: "error", message: `unknown channel: ${channel}` });
      break;
  }
}

async function handleSocketMessage(
  socket: WebSocket,
  text: string,
  sessions: TraceSessionManager,
  signal: AbortSignal,
): Promise<void> {
  const parsed: unknown = JSON.parse(text);
  const message = asRecord(parsed);
  const traceId = typeof message.traceId === "string" ? message.traceId : "";

  if (message.type !== "subscribe" && message.type !== "query") {
    send(socket, { type: "error", message: `unknown message type: ${String(message.type)}` });
    return;
  }
  const session = sessions.findSession(traceId);
  if (!session) {
    send(socket, { type: "error", message: `${UNKNOWN_SESSION_PREFIX} ${traceId}` });
    return;
  }

  if (message.type === "query") {
    send(socket, { type: "query_result", data: session.executeQuery(message) });
    return;
  }

  const channel = typeof message.channel === "string" ? message.channel : "";
  send(socket, { type: "subscribed", channel, traceId });
  await streamChannel(socket, session, channel, socketFilter(message.filter), signal);
  send(socket, { type: "stream_end", channel });
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const config = options.config ?? mergeConfig();
  const logLevel = config.server.logLevel;
  const server = Fastify({ logger: logLevel === "silent" ? false : { level: logLevel } });
  const sessions = options.sessions ?? new TraceSessionManager({ analysis: config.analysis });

  await server.register(fastifyWebsocket);

  server.addHook("onClose", async () => {
    sessions.closeAll();
  });

  server.get("/api/health", async () => ({ status: "ok" }));

  server.post<{ Body: unknown }>("/api/traces/open", async (request, reply) =>
    respond(reply, request.log, async () => {
      const filePath = asRecord(request.body).filePath;
      if (typeof filePath !== "string" || !filePath.trim()) {
        throw new Error("filePath is required");
      }
      const session = await sessions.openTrace(filePath.trim());
      request.log.info({ traceId: session.id, filePath: session.filePath }, "trace opened");
      return { id: session.id, filePath: session.filePath, info: session.getInfo() };
    }),
  );

  server.get("/api/traces", async () => ({ traces: sessions.listSessions() }));

  server.get("/api/files", async (request, reply) =>
    respond(reply, request.log, async () => ({ files: await discoverTraceFiles(config.discovery) })),
  );

  server.get<{ Params: TraceParams }>("/api/traces/:id/info", async (request, reply) =>
    respond(reply, request.log, () => sessions.getSession(request.params.id).getInfo()),
  );

  server.delete<{ Params: TraceParams }>("/api/traces/:id", async (request, reply) =>
    respond(reply, request.log, () => {
      if (!sessions.closeSession(request.params.id)) {
        throw new Error(`${UNKNOWN_SESSION_PREFIX} ${request.params.id}`);
      }
      return { message: "session closed" };
    }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"process" | "timeline" | "longest" | "from" | "to"> }>(
    "/api/traces/:id/gcstats",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const query = request.query;
        return sessions.getSession(request.params.id).getGcStats({
          process: query.process,
          timeline: boolParam(query.timeline),
          longest: intParam(query.longest, "longest"),
          from: numberParam(query.from, "from"),
          to: numberParam(query.to, "to"),
        });
      }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"process"> }>("/api/traces/:id/jitstats", async (request, reply) =>
    respond(reply, request.log, () => sessions.getSession(request.params.id).getJitStats({ process: request.query.process })),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"top" | "groupBy" | "inclusive" | "from" | "to"> }>(
    "/api/traces/:id/cpustacks",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const query = request.query;
        return sessions.getSession(request.params.id).getFlatTop({
          top: intParam(query.top, "top"),
          groupBy: parseGroupByMode(query.groupBy),
          sortByInclusive: boolParam(query.inclusive),
          from: numberParam(query.from, "from"),
          to: numberParam(query.to, "to"),
        });
      }),
  );

  server.get<{
    Params: TraceParams;
    Querystring: QueryOf<"list" | "type" | "provider" | "limit" | "from" | "to" | "pid" | "tid" | "payload">;
  }>("/api/traces/:id/events", async (request, reply) =>
    respond(reply, request.log, () => {
      const query = request.query;
      const session = sessions.getSession(request.params.id);
      const from = numberParam(query.from, "from");
      const to = numberParam(query.to, "to");
      if (boolParam(query.list)) {
        return session.getEventTypes({ provider: query.provider, from, to });
      }
      return session.getEvents({
        type: query.type,
        provider: query.provider,
        limit: intParam(query.limit, "limit"),
        from,
        to,
        pid: intParam(query.pid, "pid"),
        tid: intParam(query.tid, "tid"),
        payload: query.payload,
      });
    }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"type" | "from" | "to" | "limit"> }>(
    "/api/traces/:id/exceptions",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const query = request.query;
        return sessions.getSession(request.params.id).getExceptions({
          type: query.type,
          from: numberParam(query.from, "from"),
          to: numberParam(query.to, "to"),
          limit: intParam(query.limit, "limit"),
        });
      }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"top" | "groupBy" | "from" | "to"> }>(
    "/api/traces/:id/allocations",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const query = request.query;
        return sessions.getSession(request.params.id).getAllocations({
          top: intParam(query.top, "top"),
          groupBy: parseAllocationGroupBy(query.groupBy),
          from: numberParam(query.from, "from"),
          to: numberParam(query.to, "to"),
        });
      }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"depth"> }>("/api/traces/:id/calltree", async (request, reply) =>
    respond(reply, request.log, () =>
      sessions.getSession(request.params.id).getCallTree(intParam(request.query.depth, "depth")),
    ),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"path" | "depth"> }>(
    "/api/traces/:id/calltree/children",
    async (request, reply) =>
      respond(reply, request.log, () =>
        sessions
          .getSession(request.params.id)
          .getCallTreeChildren(pathParam(request.query.path), intParam(request.query.depth, "depth") ?? 1),
      ),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"path"> }>(
    "/api/traces/:id/calltree/hotpath",
    async (request, reply) =>
      respond(reply, request.log, () => sessions.getSession(request.params.id).getHotPath(pathParam(request.query.path))),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"method"> }>(
    "/api/traces/:id/calltree/callercallee",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const session = sessions.getSession(request.params.id);
        return session.getCallerCallee(requiredParam(request.query.method, "method"));
      }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"from" | "to" | "buckets" | "lanes"> }>(
    "/api/traces/:id/timeline",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const query = request.query;
        return sessions.getSession(request.params.id).getTimeline({
          from: numberParam(query.from, "from"),
          to: numberParam(query.to, "to"),
          bucketCount: intParam(query.buckets, "buckets"),
          lanes: query.lanes !== undefined ? parseLanes(query.lanes) : undefined,
        });
      }),
  );

  server.get<{ Params: TraceParams; Querystring: QueryOf<"at" | "window"> }>(
    "/api/traces/:id/snapshot",
    async (request, reply) =>
      respond(reply, request.log, () => {
        const session = sessions.getSession(request.params.id);
        const at = numberParam(requiredParam(request.query.at, "at"), "at") ?? 0;
        return session.getSnapshot(at, numberParam(request.query.window, "window"));
      }),
  );

  server.post<{ Params: TraceParams; Body: unknown }>("/api/traces/:id/query", async (request, reply) =>
    respond(reply, request.log, () => {
      const result = sessions.getSession(request.params.id).executeQuery(request.body);
      if ("error" in result) reply.code(400);
      return result;
    }),
  );

  server.get("/ws", { websocket: true }, (socket, request) => {
    const controller = new AbortController();
    socket.on("close", () => controller.abort());
    socket.on("message", (data) => {
      handleSocketMessage(socket, data.toString(), sessions, controller.signal).catch((error: unknown) => {
        request.log.debug({ err: error }, "websocket message failed");
        send(socket, { type: "error", message: asErrorMessage(error) });
      });
    });
  });

  return server;
}

export interface RunServerOptions {
  host?: string;
  port?: number;
  configPath?: string;
}

export async function runServer(options: RunServerOptions = {}): Promise<void> {
  const configPath = options.configPath ?? process.env.PERFSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH;
  const config = await loadConfig(configPath);
  const host = options.host ?? process.env.PERFSCOPE_HOST ?? config.server.host;
  const port = options.port ?? Number(process.env.PERFSCOPE_PORT ?? config.server.port);

  const server = await createServer({ config });
  await server.listen({ host, port });

  process.once("SIGINT", () => {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error(asErrorMessage(error));
        process.exit(1);
      },
    );
  });

  // eslint-disable-next-line no-console
  console.log(`perfscope server: http://${host}:${port}`);
}
