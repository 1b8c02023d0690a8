import type { JSONSchemaType } from "ajv";

import { KIND_NAMES } from "./kinds.js";
import type { SaturatingIntJSON } from "./saturating.js";

export const saturatingIntSchema: JSONSchemaType<SaturatingIntJSON> = {
  $id: "satint/saturating-int.json",
  type: "object",
  additionalProperties: false,
  required: ["kind", "value"],
  properties: {
    kind: { type: "string", enum: [...KIND_NAMES] },
    // decimal string so 64-bit values survive JSON.parse
    value: { type: "string", pattern: "^-?(0|[1-9][0-9]*)$" },
  },
};
