/**
 * JSON codec validated by a zod schema.
 *
 * Cached entries outlive deploys, so anything that fails the schema is
 * reported as unrecognised rather than trusted.
 */

import type { z } from "zod";
import type { CacheCodec } from "./types.js";

export function jsonCodec<S extends z.ZodTypeAny>(schema: S): CacheCodec<z.output<S>> {
  return {
    encode(value) {
      return JSON.stringify(value);
    },

    decode(raw) {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        return null;
      }

      const result = schema.safeParse(parsed);
      return result.success ? result.data : null;
    },
  };
}
