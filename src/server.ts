// src/server.ts
// ============================================================================
// Bootstrap fuer die Loyalty API
// ----------------------------------------------------------------------------
// Aufgaben:
//  - Prozessstart: buildApp() + listen()
//  - Prozessweite Fehlerwaechter (unhandledRejection / uncaughtException)
//  - Geordneter Shutdown mit Timeout-Guard (SIGINT, SIGTERM, SIGUSR2)
//  - Node-HTTP Low-Level Timeouts (gegen Slowloris / haengende Verbindungen)
// ============================================================================

import type { FastifyInstance } from "fastify";
import { buildApp, setReady } from "./app.js";
import { env, logEnvSummary } from "./libs/env.js";

// Shutdown-Konfiguration
// Maximale Wartezeit für geordnetes Beenden, bevor hart terminiert wird.
const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS ?? 10_000);

// HTTP-Timeouts (Node-Server-Ebene, zusätzlich zu Fastify-Optionen)
const REQUEST_TIMEOUT_MS = Number(process.env.REQUEST_TIMEOUT_MS ?? 30_000);
const HEADERS_TIMEOUT_MS = Number(process.env.HEADERS_TIMEOUT_MS ?? 61_000);
const KEEPALIVE_TIMEOUT_MS = Number(process.env.KEEPALIVE_TIMEOUT_MS ?? 65_000);

// Doppel-Start/Mehrfach-Shutdown verhindern
let app: FastifyInstance | undefined;
let startingUp = false;
let shuttingDown = false;

/**
 * Loggt ueber den Fastify-Logger (pino), vor dem Start ueber console.*
 */
function safeLog(
  level: "info" | "warn" | "error",
  msg: string,
  extra: Record<string, unknown> = {},
) {
  if (app) {
    app.log[level]({ ctx: "server", ...extra }, msg);
    return;
  }
  const fn =
    level === "error" ? console.error : level === "warn" ? console.warn : console.log;
  fn(msg, extra);
}

// ============================================================================
// Prozessweite Fehlerwächter
// ============================================================================

process.on("unhandledRejection", (reason) => {
  safeLog("error", "unhandled_rejection", { reason });
  // Kein harter Exit → Shutdown wird über Signal ausgelöst.
});

process.on("uncaughtException", (err) => {
  safeLog("error", "uncaught_exception", { err });
  void shutdown("uncaughtException");
});

// ============================================================================
// Start & Listen
// ============================================================================

async function start() {
  if (startingUp) return;
  startingUp = true;

  try {
    app = await buildApp();

    // app.server ist der native Node http Server
    app.server.requestTimeout = REQUEST_TIMEOUT_MS;
    app.server.headersTimeout = HEADERS_TIMEOUT_MS;
    app.server.keepAliveTimeout = KEEPALIVE_TIMEOUT_MS;

    const log = app.log;
    logEnvSummary((msg, extra) => log.info({ config: extra }, msg));

    app.log.info(
      {
        env: env.NODE_ENV,
        pid: process.pid,
        node: process.version,
        host: env.HOST,
        port: env.PORT,
        requestTimeoutMs: REQUEST_TIMEOUT_MS,
        headersTimeoutMs: HEADERS_TIMEOUT_MS,
        keepAliveTimeoutMs: KEEPALIVE_TIMEOUT_MS,
      },
      "loyalty_api_bootstrap",
    );

    await app.listen({ host: env.HOST, port: env.PORT });

    app.log.info({ address: app.server.address() }, "loyalty_api_listening");
  } catch (err) {
    // Startfehler → Exit, damit Orchestrator (Docker/K8s) neu starten kann.
    console.error("server_start_failed", err);
    process.exitCode = 1;
    setTimeout(() => process.exit(1), 50);
  }
}

// ============================================================================
// Geordneter Shutdown
// ============================================================================

async function shutdown(reason: string) {
  if (shuttingDown) return;
  shuttingDown = true;

  // Fail-Safe: falls irgendwas hängt, nach Timeout hart beenden
  const killTimer = setTimeout(() => {
    safeLog("error", "shutdown_forced_exit", {
      timeoutMs: SHUTDOWN_TIMEOUT_MS,
      reason,
    });
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);
  killTimer.unref();

  try {
    safeLog("info", "shutdown_received", { reason });

    // 1) Readiness sofort degradieren, Loadbalancer nimmt Instanz aus Rotation
    setReady(false);

    // 2) HTTP-Server schließen, offene Requests laufen aus
    if (app) {
      await app.close(); // triggert onClose (deps.close: Redis + DB)
      safeLog("info", "server_closed");
    }

    clearTimeout(killTimer);
    process.exit(0);
  } catch (err) {
    safeLog("error", "shutdown_error", { err });
    clearTimeout(killTimer);
    process.exit(1);
  }
}

// ============================================================================
// Signal-Handler (einmalig registriert)
// ============================================================================
// SIGINT  = Ctrl+C / `docker stop`
// SIGTERM = Standard-Stop in Docker/Kubernetes
// SIGUSR2 = häufig von nodemon im Dev-Modus genutzt

process.once("SIGINT", () => void shutdown("SIGINT"));
process.once("SIGTERM", () => void shutdown("SIGTERM"));
process.once("SIGUSR2", () => void shutdown("SIGUSR2"));

// ============================================================================
// Bootstrap
// ============================================================================

void start();
