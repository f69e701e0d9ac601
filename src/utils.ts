export function nowIso() {
  return new Date().toISOString();
}

export function describeError(error: unknown) {
  if (error instanceof Error) return String(error.message || error.name);
  return String(error);
}

export function readErrorField(error: unknown, field: "status" | "code"): number | null {
  if (!error || typeof error !== "object" || !(field in error)) return null;
  const value = Number(Reflect.get(error, field));
  return Number.isFinite(value) ? value : null;
}
