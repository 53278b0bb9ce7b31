// src/libs/phone.ts
// ============================================================================
// Telefonnummern normalisieren (E.164)
// ----------------------------------------------------------------------------
// - Trennzeichen (Leerzeichen, "-", ".", Klammern) werden entfernt
// - fuehrendes "00" wird zu "+", fehlendes "+" wird ergaenzt
// - Ergebnis muss ^\+[1-9]\d{7,14}$ erfuellen, sonst null
// ============================================================================

const SEPARATORS_RE = /[\s\-.()]/g;
const E164_RE = /^\+[1-9]\d{7,14}$/;

export function normalizePhone(raw: string): string | null {
  let value = raw.trim().replace(SEPARATORS_RE, "");
  if (value.startsWith("00")) {
    value = `+${value.slice(2)}`;
  } else if (!value.startsWith("+")) {
    value = `+${value}`;
  }
  return E164_RE.test(value) ? value : null;
}

/** "+79991234567" -> "+7******4567" (nur fuer Logs) */
export function maskPhone(phone: string): string {
  if (phone.length <= 6) return "***";
  return `${phone.slice(0, 2)}${"*".repeat(phone.length - 6)}${phone.slice(-4)}`;
}
