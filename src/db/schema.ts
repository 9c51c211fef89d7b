import {
  pgTable,
  bigserial,
  varchar,
  text,
  boolean,
  timestamp,
  integer,
  jsonb,
  primaryKey,
  index,
  pgEnum,
} from "drizzle-orm/pg-core";
import type { ScanCounts } from "../types/audit.js";

// =============================================================================
// ENUMS
// =============================================================================

export const checkpointStatusEnum = pgEnum("checkpoint_status", [
  "in_progress",
  "completed",
  "skipped",
]);

// =============================================================================
// CHECKPOINTS
// =============================================================================

export const checkpoints = pgTable(
  "checkpoints",
  {
    runId: varchar("run_id", { length: 128 }).notNull(),
    jobIndex: integer("job_index").notNull(),
    jobUrl: text("job_url").notNull(),
    status: checkpointStatusEnum("status").notNull(),
    siteIndex: integer("site_index").notNull().default(0),
    siteLevelDone: boolean("site_level_done").notNull().default(false),
    lastListIndex: integer("last_list_index").notNull().default(-1),
    lastItemId: integer("last_item_id").notNull().default(0),
    counts: jsonb("counts").$type<ScanCounts>().notNull(),
    message: text("message"),
    updatedAt: timestamp("updated_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [primaryKey({ columns: [table.runId, table.jobIndex] })]
);

// =============================================================================
// OUTPUT STREAMS
// =============================================================================

export const siteContents = pgTable(
  "site_contents",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    runId: varchar("run_id", { length: 128 }).notNull(),
    jobIndex: integer("job_index").notNull(),
    resourceId: varchar("resource_id", { length: 255 }).notNull(),
    type: varchar("type", { length: 32 }).notNull(),
    title: text("title").notNull(),
    url: text("url").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index("site_contents_run_job_idx").on(table.runId, table.jobIndex)]
);

export const siteGroups = pgTable(
  "site_groups",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    runId: varchar("run_id", { length: 128 }).notNull(),
    jobIndex: integer("job_index").notNull(),
    siteUrl: text("site_url").notNull(),
    groupId: varchar("group_id", { length: 64 }).notNull(),
    role: varchar("role", { length: 32 }).notNull(),
    title: text("title").notNull(),
    permissionLevel: varchar("permission_level", { length: 255 }).notNull(),
    owner: text("owner").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [index("site_groups_run_job_idx").on(table.runId, table.jobIndex)]
);

export const brokenNodes = pgTable(
  "broken_nodes",
  {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    runId: varchar("run_id", { length: 128 }).notNull(),
    jobIndex: integer("job_index").notNull(),
    resourceId: varchar("resource_id", { length: 255 }).notNull(),
    type: varchar("type", { length: 32 }).notNull(),
    title: text("title").notNull(),
    url: text("url").notNull(),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  },
  (table) => [
    index("broken_nodes_run_job_idx").on(table.runId, table.jobIndex),
    index("broken_nodes_resource_id_idx").on(table.resourceId),
  ]
);

/**
 * Columns shared by site users and access entries
 */
function accessColumns() {
  return {
    id: bigserial("id", { mode: "number" }).primaryKey(),
    runId: varchar("run_id", { length: 128 }).notNull(),
    jobIndex: integer("job_index").notNull(),
    resourceId: varchar("resource_id", { length: 255 }).notNull(),
    resourceKind: varchar("resource_kind", { length: 32 }).notNull(),
    resourceUrl: text("resource_url").notNull(),
    principalId: varchar("principal_id", { length: 255 }).notNull(),
    principalKind: varchar("principal_kind", { length: 32 }).notNull(),
    loginName: text("login_name").notNull(),
    displayName: text("display_name").notNull(),
    email: text("email").notNull(),
    permissionLevel: varchar("permission_level", { length: 255 }).notNull(),
    viaGroup: text("via_group").notNull(),
    viaGroupId: varchar("via_group_id", { length: 255 }).notNull(),
    viaGroupKind: varchar("via_group_kind", { length: 32 }).notNull(),
    viaGroupChain: jsonb("via_group_chain").$type<string[]>().notNull(),
    nestingLevel: integer("nesting_level").notNull(),
    parentGroup: text("parent_group").notNull(),
    assignmentType: varchar("assignment_type", { length: 32 }).notNull(),
    resolution: varchar("resolution", { length: 32 }).notNull(),
    sharedAt: varchar("shared_at", { length: 64 }),
    sharedByLogin: text("shared_by_login"),
    sharedByDisplayName: text("shared_by_display_name"),
    createdAt: timestamp("created_at", { withTimezone: true })
      .defaultNow()
      .notNull(),
  };
}

export const siteUsers = pgTable("site_users", accessColumns(), (table) => [
  index("site_users_run_job_idx").on(table.runId, table.jobIndex),
]);

export const accessEntries = pgTable("access_entries", accessColumns(), (table) => [
  index("access_entries_run_job_idx").on(table.runId, table.jobIndex),
  index("access_entries_resource_id_idx").on(table.resourceId),
  index("access_entries_login_name_idx").on(table.loginName),
]);

// =============================================================================
// TYPE EXPORTS
// =============================================================================

export type CheckpointRecord = typeof checkpoints.$inferSelect;
export type NewCheckpointRecord = typeof checkpoints.$inferInsert;
export type NewSiteContentRecord = typeof siteContents.$inferInsert;
export type NewSiteGroupRecord = typeof siteGroups.$inferInsert;
export type NewBrokenNodeRecord = typeof brokenNodes.$inferInsert;
export type NewAccessRecord = typeof accessEntries.$inferInsert;
