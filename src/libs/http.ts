// ============================================================================
// src/libs/http.ts
// ----------------------------------------------------------------------------
// HTTP-Hilfsfunktionen (Logging, Keys, Metriken, Header)
// ============================================================================
import type { FastifyRequest } from "fastify";

export const UNMATCHED_ROUTE = "not_found";

/**
 * Stabile Routen-ID (Metrik-Label): nur das registrierte Routen-Muster,
 * nie die rohe URL. Alles, was im NotFound-Handler landet, teilt sich
 * UNMATCHED_ROUTE.
 */
export function getRouteId(req: FastifyRequest): string {
  const url = req.routeOptions?.url;
  return url && !url.includes("*") ? url : UNMATCHED_ROUTE;
}

/** Ermittelt, ob die Anfrage einen Health-Endpoint adressiert. */
export function isHealthPath(req: FastifyRequest): boolean {
  const url = (req.raw.url ?? "").split("?")[0];
  return (
    url === "/health" ||
    url === "/metrics" ||
    url.startsWith("/health/")
  );
}

/** Header kann string | string[] | undefined sein; leer zählt als fehlend. */
export function readHeader(value: unknown): string | undefined {
  if (typeof value === "string") {
    const t = value.trim();
    return t.length > 0 ? t : undefined;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    const t = value[0].trim();
    return t.length > 0 ? t : undefined;
  }
  return undefined;
}

export type ClientMeta = {
  ip: string | null;
  userAgent: string | null;
};

export function clientMeta(req: FastifyRequest): ClientMeta {
  return {
    ip: req.ip || null,
    userAgent: readHeader(req.headers["user-agent"])?.slice(0, 512) ?? null,
  };
}
