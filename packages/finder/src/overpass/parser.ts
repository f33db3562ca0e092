/**
 * Overpass JSON response decoder.
 *
 * Converts a raw `[out:json]` response body into RawNode/RawWay elements.
 * With `out meta;` Overpass also sends version, timestamp and user
 * fields on every element; those are dropped here.
 */

import type { RawElement } from "@route-pois/types";
import { z } from "zod";
import { ResponseDecodeError } from "../errors.js";

const tagsSchema = z
  .record(z.union([z.string(), z.number(), z.boolean(), z.null()]))
  .default({});

const nodeSchema = z.object({
  type: z.literal("node"),
  id: z.number().int(),
  lat: z.number().finite(),
  lon: z.number().finite(),
  tags: tagsSchema,
});

const waySchema = z.object({
  type: z.literal("way"),
  id: z.number().int(),
  nodes: z.array(z.number().int()),
  tags: tagsSchema,
});

const responseSchema = z.object({
  elements: z.array(z.discriminatedUnion("type", [nodeSchema, waySchema])),
});

/**
 * Decode an Overpass JSON response body.
 *
 * Every element is returned, in response order; nothing is filtered.
 *
 * @param body - Response body bytes (or text)
 * @throws ResponseDecodeError on invalid JSON or an unexpected shape
 */
export function decodeResponse(body: Buffer | string): RawElement[] {
  const text = typeof body === "string" ? body : body.toString("utf-8");

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ResponseDecodeError("decoding response body: invalid JSON", {
      cause: err,
    });
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "response";
    throw new ResponseDecodeError(
      `decoding response body: ${where}: ${issue?.message ?? "invalid"}`,
      { cause: parsed.error }
    );
  }

  return parsed.data.elements;
}
