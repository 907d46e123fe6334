/**
 * Wire shapes of the Keep `changes` endpoint.
 *
 * Responses are validated with zod; unknown fields pass through untouched so
 * a node can be sent back with everything the service gave us.
 */

import { z } from "zod";

export const ZERO_TIMESTAMP = "1970-01-01T00:00:00.000Z";

export const timestampsSchema = z
  .object({
    kind: z.string().optional(),
    created: z.string().optional(),
    updated: z.string().optional(),
    trashed: z.string().optional(),
    deleted: z.string().optional(),
    userEdited: z.string().optional(),
  })
  .passthrough();

export const labelRefSchema = z
  .object({
    labelId: z.string(),
    deleted: z.string().optional(),
  })
  .passthrough();

export const rawNodeSchema = z
  .object({
    id: z.string(),
    kind: z.string().optional(),
    type: z.string(),
    parentId: z.string(),
    serverId: z.string().optional(),
    parentServerId: z.string().optional(),
    baseVersion: z.string().optional(),
    sortValue: z.union([z.number(), z.string()]).optional(),
    title: z.string().optional(),
    text: z.string().optional(),
    color: z.string().optional(),
    isArchived: z.boolean().optional(),
    isPinned: z.boolean().optional(),
    checked: z.boolean().optional(),
    timestamps: timestampsSchema.default({}),
    labelIds: z.array(labelRefSchema).optional(),
  })
  .passthrough();

export const rawLabelSchema = z
  .object({
    mainId: z.string(),
    name: z.string(),
    timestamps: timestampsSchema.default({}),
    lastMerged: z.string().optional(),
  })
  .passthrough();

export const changesResponseSchema = z
  .object({
    nodes: z.array(rawNodeSchema).default([]),
    userInfo: z
      .object({
        labels: z.array(rawLabelSchema).default([]),
      })
      .passthrough()
      .optional(),
    toVersion: z.string().optional(),
    truncated: z.boolean().optional(),
    forceFullResync: z.boolean().optional(),
  })
  .passthrough();

export type RawTimestamps = z.infer<typeof timestampsSchema>;
export type RawLabelRef = z.infer<typeof labelRefSchema>;
export type RawNode = z.infer<typeof rawNodeSchema>;
export type RawLabel = z.infer<typeof rawLabelSchema>;
export type ChangesResponse = z.infer<typeof changesResponseSchema>;

export interface RequestHeader {
  clientSessionId: string;
  clientPlatform: "ANDROID";
  clientVersion: { major: string; minor: string; build: string; revision: string };
  capabilities: Array<{ type: string }>;
}

export interface ChangesRequest {
  nodes: RawNode[];
  clientTimestamp: string;
  requestHeader: RequestHeader;
  targetVersion?: string;
  userInfo?: { labels: RawLabel[] };
}

/** True when a wire timestamp is set to anything after the epoch. */
export function isTimestampSet(value: string | undefined): boolean {
  if (!value) return false;
  const parsed = Date.parse(value);
  return !Number.isNaN(parsed) && parsed > 0;
}
