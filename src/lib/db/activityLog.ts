/**
 * Activity log operations
 *
 * Audit trail of account and order events. Messages carry ids only,
 * never names, addresses or contact details.
 */

import { queryRows } from "#lib/db/client.ts";
import { col, defineTable } from "#lib/db/table.ts";

/** Activity log entry */
export interface ActivityLogEntry {
  id: number;
  created: string;
  message: string;
}

/** Activity log input for create */
export type ActivityLogInput = {
  message: string;
};

export const activityLogTable = defineTable<ActivityLogEntry, ActivityLogInput>({
  name: "activity_log",
  primaryKey: "id",
  schema: {
    id: col.generated<number>(),
    created: col.timestamp(),
    message: col.simple<string>(),
  },
});

/**
 * Log an activity
 */
export const logActivity = (message: string): Promise<ActivityLogEntry> =>
  activityLogTable.insert({ message });

/**
 * Get activity log entries (most recent first)
 */
export const getAllActivityLog = (limit = 100): Promise<ActivityLogEntry[]> =>
  queryRows<ActivityLogEntry>(
    "SELECT * FROM activity_log ORDER BY created DESC, id DESC LIMIT ?",
    [limit],
  );
