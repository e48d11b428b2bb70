import { z } from "zod";
import type { JsonValue } from "../types/index.js";
import { MAX_ID } from "./id.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const idSchema = z.number().int().min(0).max(MAX_ID);

export const errorObjectSchema = z
  .object({
    code: z.number().int(),
    message: z.string(),
    data: jsonValueSchema.optional(),
  })
  .strict();

export const requestSchema = z
  .object({
    jsonrpc: z.literal("2.0"),
    method: z.string(),
    params: jsonValueSchema.optional(),
    id: idSchema.optional(),
  })
  .strict();

export const responseSchema = z
  .object({
    jsonrpc: z.literal("2.0"),
    result: jsonValueSchema.optional(),
    error: errorObjectSchema.optional(),
    id: idSchema.nullable().optional(),
  })
  .strict()
  .refine((response) => response.result !== undefined || response.error !== undefined, {
    message: "missing 'result' or 'error' field",
  });
