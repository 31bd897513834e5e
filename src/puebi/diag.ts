function isDebugEnabled(): boolean {
  const raw = String(process.env.DEBUG_PUEBI || "").trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function debugPuebi(scope: string, event: string, data: Record<string, unknown>): void {
  if (!isDebugEnabled()) { return; }
  try {
    console.log(JSON.stringify({ tag: "puebi", scope, event, ...data }));
  } catch {
    // ignore
  }
}
