/**
 * JSON Schema for rules documents, checked with Ajv
 */

const scalar = { type: ["string", "number"] };
const message = { type: "string" };

const rangeRule = {
  type: "object",
  properties: {
    min: scalar,
    max: scalar,
    include: {
      type: "array",
      items: { type: "boolean" },
      minItems: 2,
      maxItems: 2,
    },
    message,
  },
  additionalProperties: false,
};

const setRule = {
  type: "object",
  properties: {
    items: { type: "array", items: scalar },
    pairs: {
      type: "array",
      items: {
        type: "array",
        items: [scalar, { type: "string" }],
        minItems: 2,
        maxItems: 2,
      },
    },
    labels: { type: "array", items: { type: "string" } },
    multiple: {
      oneOf: [
        { type: "boolean" },
        {
          type: "array",
          items: { type: "integer", minimum: 0 },
          minItems: 2,
          maxItems: 2,
        },
      ],
    },
    zero: { type: "string" },
    sort: { type: "boolean" },
    message,
  },
  oneOf: [{ required: ["items"] }, { required: ["pairs"] }],
  additionalProperties: false,
};

const existsRule = {
  type: "object",
  properties: {
    table: { type: "string", minLength: 1 },
    field: { type: "string", minLength: 1 },
    labelField: { type: "string", minLength: 1 },
    multiple: { type: "boolean" },
    orderBy: {
      type: "array",
      items: {
        type: "array",
        items: [{ type: "string" }, { enum: [1, -1] }],
        minItems: 2,
        maxItems: 2,
      },
    },
    zero: { type: "string" },
    message,
  },
  required: ["table"],
  additionalProperties: false,
};

const absentRule = {
  type: "object",
  properties: {
    table: { type: "string", minLength: 1 },
    field: { type: "string", minLength: 1 },
    message,
  },
  required: ["table"],
  additionalProperties: false,
};

function single(key: string, schema: object) {
  return {
    type: "object",
    properties: { [key]: schema },
    required: [key],
    additionalProperties: false,
  };
}

export const rulesDocumentSchema = {
  type: "object",
  properties: {
    store: {
      type: "object",
      properties: {
        uri: { type: "string" },
        database: { type: "string" },
        idField: { type: "string" },
        formats: {
          type: "object",
          additionalProperties: { type: "string" },
        },
      },
      additionalProperties: false,
    },
    fields: {
      type: "object",
      additionalProperties: {
        type: "array",
        items: {
          oneOf: [
            single("range", rangeRule),
            single("set", setRule),
            single("exists", existsRule),
            single("absent", absentRule),
          ],
        },
      },
    },
  },
  required: ["fields"],
  additionalProperties: false,
};
