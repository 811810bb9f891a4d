export function parseAdminIds(raw: string): number[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s !== "")
    .map(Number)
    .filter(Number.isFinite);
}

export function isAdmin(tgUserId: number | undefined, adminIds: readonly number[]): boolean {
  if (!tgUserId) return false;
  return adminIds.includes(tgUserId);
}
