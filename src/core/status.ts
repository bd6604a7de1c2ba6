import type { EnablementStatus } from "./types.js";

/**
 * (target, server) → status lookup filled in by the scanner. Missing pairs read
 * as "unknown".
 */
export class StatusMatrix {
  private readonly rows = new Map<string, Map<string, EnablementStatus>>();

  set(targetName: string, serverId: string, status: EnablementStatus): void {
    let row = this.rows.get(targetName);
    if (!row) {
      row = new Map();
      this.rows.set(targetName, row);
    }
    row.set(serverId, status);
  }

  get(targetName: string, serverId: string): EnablementStatus {
    return this.rows.get(targetName)?.get(serverId) ?? "unknown";
  }

  /** Number of (target, server) pairs recorded */
  get size(): number {
    let total = 0;
    for (const row of this.rows.values()) total += row.size;
    return total;
  }

  toJSON(): Record<string, Record<string, EnablementStatus>> {
    const out: Record<string, Record<string, EnablementStatus>> = {};
    for (const [target, row] of this.rows) {
      out[target] = Object.fromEntries(row);
    }
    return out;
  }
}
