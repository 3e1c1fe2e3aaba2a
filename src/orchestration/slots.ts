import type { ResultSet, ServiceId, ServicePayloads, ServiceResult } from "../types";

type MutableResultSet = { [K in ServiceId]?: ServiceResult<ServicePayloads[K]> };

/**
 * One write-once slot per service. Completions that land after {@link freeze} are dropped, so a
 * frozen set never grows an entry for a call that was still pending when it was taken.
 */
export class ResultSlots {
  private readonly entries: MutableResultSet = {};

  private frozen: ResultSet | null = null;

  set<K extends ServiceId>(id: K, result: ServiceResult<ServicePayloads[K]>): boolean {
    if (this.frozen !== null || this.entries[id] !== undefined) {
      return false;
    }
    const entries: { [Q in K]?: ServiceResult<ServicePayloads[Q]> } = this.entries;
    entries[id] = result;
    return true;
  }

  freeze(): ResultSet {
    if (this.frozen === null) {
      this.frozen = Object.freeze({ ...this.entries });
    }
    return this.frozen;
  }
}

export function countSuccessful(resultSet: ResultSet): number {
  return Object.values(resultSet).filter((result) => result?.status === "success").length;
}
