import * as z from "zod/v4";

export const DEFAULT_SYNC_PATH = "...";
export const DEFAULT_CHANGES_MAX = 10;

export const DepotPathSchema = z.string();

export const FileListSchema = z.array(z.string());

export const ChangelistSchema = z.string();

export const MaxChangesSchema = z.number().int().min(0);
