/**
 * Streamable HTTP transport.
 *
 * Session model:
 *  - A client opens a session by POSTing a JSON-RPC `initialize` request to
 *    /mcp without an `mcp-session-id` header. A new transport + MCP Server
 *    pair is created and the SDK returns the generated session id in headers.
 *  - Later requests carry the same `mcp-session-id` header and reuse that
 *    transport. Closed sessions are evicted from the in-memory map.
 *
 * Endpoints:
 *  - POST /mcp    : JSON-RPC requests (initial + subsequent).
 *  - GET  /mcp    : Streaming channel for an existing session.
 *  - DELETE /mcp  : Session teardown.
 *  - GET  /health : Indexing / profile status from `statusManager`.
 *
 * Environment variables:
 *  MCP_PORT: Port to bind (default 3000)
 *  HOST: Interface to bind (default 127.0.0.1)
 *  ALLOWED_HOSTS: Comma-separated host[:port] whitelist; local-only by default.
 *  ENABLE_DNS_REBINDING_PROTECTION: "false" disables it.
 */
import express from "express";
import { randomUUID } from "node:crypto";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { statusManager } from "../status";

function sessionHeader(req: express.Request): string | undefined {
  const v = req.headers["mcp-session-id"];
  return Array.isArray(v) ? v[0] : v;
}

/**
 * Bootstraps the Express HTTP server & per-session MCP transport layer.
 *
 * @param createServer Factory producing a new, unconnected MCP `Server` for each session.
 * @returns Resolves once the HTTP listener is bound.
 */
export async function startHttpTransport(createServer: () => Server) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));

  const port = Number(process.env.MCP_PORT ?? 3000);
  const host = (process.env.HOST ?? "127.0.0.1").trim();
  const defaultAllowedHosts = Array.from(
    new Set([
      "127.0.0.1",
      `127.0.0.1:${port}`,
      "localhost",
      `localhost:${port}`,
      host,
      `${host}:${port}`,
    ]),
  );

  /** Active session transports mapped by session id. */
  const transports = new Map<string, StreamableHTTPServerTransport>();

  app.post("/mcp", async (req: express.Request, res: express.Response) => {
    try {
      const sessionId = sessionHeader(req);
      let transport = sessionId ? transports.get(sessionId) : undefined;

      if (!transport && !sessionId && isInitializeRequest(req.body)) {
        const created = new StreamableHTTPServerTransport({
          sessionIdGenerator: () => randomUUID(),
          onsessioninitialized: (sid: string) => {
            transports.set(sid, created);
          },
          enableDnsRebindingProtection:
            (process.env.ENABLE_DNS_REBINDING_PROTECTION ?? "true") !== "false",
          allowedHosts: (process.env.ALLOWED_HOSTS ?? defaultAllowedHosts.join(","))
            .split(",")
            .map((s) => s.trim())
            .filter(Boolean),
        });

        const server = createServer();
        let closing = false;
        created.onclose = () => {
          if (closing) return;
          closing = true;
          if (created.sessionId) transports.delete(created.sessionId);
          // server.close() closes the transport again, which would re-enter here
          created.onclose = undefined;
          server.close().catch((e) => console.error("[MCP] Failed to close session server:", e));
        };
        await server.connect(created);
        transport = created;
      }

      if (!transport) {
        res.status(400).json({
          jsonrpc: "2.0",
          error: { code: -32000, message: "Bad Request: No valid session ID provided" },
          id: null,
        });
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      console.error("[MCP] HTTP POST error:", err);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  // GET and DELETE /mcp are only valid for an existing session.
  const handleSessionRequest = async (req: express.Request, res: express.Response) => {
    const sessionId = sessionHeader(req);
    const transport = sessionId ? transports.get(sessionId) : undefined;
    if (!transport) {
      res.status(400).send("Invalid or missing session ID");
      return;
    }
    await transport.handleRequest(req, res);
  };

  app.get("/mcp", handleSessionRequest);
  app.delete("/mcp", handleSessionRequest);

  app.get("/health", (_req, res) => {
    res.json(statusManager.getStatus());
  });

  await new Promise<void>((resolve) => {
    app.listen(port, host, () => {
      console.error(`[MCP] Streamable HTTP listening at http://${host}:${port}/mcp`);
      resolve();
    });
  });
}
