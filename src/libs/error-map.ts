// Postgres-Fehlercodes → HTTP (nur was sicher nach außen darf)

export type MappedDbError = {
  status: number;
  message: string;
};

function readPgCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const code = err.code;
  return typeof code === "string" ? code : undefined;
}

export function mapDbError(err: unknown): MappedDbError | null {
  switch (readPgCode(err)) {
    case "23505":
      return {
        status: 400,
        message: "Operation could not be completed.",
      };
    case "23503":
    case "23514":
    case "23502":
    case "22P02":
      return {
        status: 400,
        message: "Invalid input data.",
      };
    default:
      return null;
  }
}
