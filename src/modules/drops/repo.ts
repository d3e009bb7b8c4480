import type { AxiosInstance } from "axios";
import { FeedUnavailableError, describeError } from "../../lib/errors";
import { statusOf } from "../../lib/http";
import { parseDropTable } from "../relics/catalog";
import type { DropTableDocument } from "../relics/types";

/** Where the relic drop tables come from. Tests hand in their own. */
export interface DropTableSource {
  fetchDropTable(): Promise<DropTableDocument>;
}

export const RELICS_DOCUMENT = "relics.json";

/**
 * Reads the drop-table feed in a single GET. Any failure is fatal for the
 * refresh, so it surfaces as FeedUnavailableError.
 */
export const createDropTableSource = (http: AxiosInstance, baseUrl: string): DropTableSource => ({
  async fetchDropTable() {
    const url = `${baseUrl}/${RELICS_DOCUMENT}`;
    let body: unknown;
    try {
      const response = await http.get<unknown>(url);
      body = response.data;
    } catch (error) {
      const status = statusOf(error);
      throw new FeedUnavailableError(
        `Drop-table feed unavailable (${status ?? describeError(error)})`,
        error,
      );
    }
    return parseDropTable(body);
  },
});
