/**
 * JSON shape inference
 *
 * A shape keeps the structure of a JSON document, the length of every
 * array and one sample item per array. Expanding a shape repeats the
 * sample to the recorded length, so documents of uniform records come
 * back close to the original and irregular ones do not.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export type ShapeNode =
  | { kind: 'value'; value: JsonPrimitive }
  | { kind: 'array'; length: number; sample: ShapeNode | null }
  | { kind: 'object'; fields: Record<string, ShapeNode> };

const MAX_STRING = 64;

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Parse bytes as JSON; undefined when they are not a JSON document
 */
export function parseJson(bytes: Buffer): JsonValue | undefined {
  try {
    const parsed: unknown = JSON.parse(bytes.toString('utf8'));
    return isJsonValue(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

export function inferShape(value: JsonValue): ShapeNode {
  if (Array.isArray(value)) {
    const first = value[0];
    return { kind: 'array', length: value.length, sample: first === undefined ? null : inferShape(first) };
  }
  if (value !== null && typeof value === 'object') {
    const fields: Record<string, ShapeNode> = {};
    for (const [key, field] of Object.entries(value)) {
      fields[key] = inferShape(field);
    }
    return { kind: 'object', fields };
  }
  if (typeof value === 'string' && value.length > MAX_STRING) {
    return { kind: 'value', value: value.slice(0, MAX_STRING) };
  }
  return { kind: 'value', value };
}

export function expandShape(shape: ShapeNode): JsonValue {
  switch (shape.kind) {
    case 'value':
      return shape.value;
    case 'array': {
      const { sample } = shape;
      return sample ? Array.from({ length: shape.length }, () => expandShape(sample)) : [];
    }
    case 'object': {
      const result: Record<string, JsonValue> = {};
      for (const [key, field] of Object.entries(shape.fields)) {
        result[key] = expandShape(field);
      }
      return result;
    }
  }
}

/**
 * Compact outline, e.g. `{id: number, tags: [string ×3]}`
 */
export function renderShape(shape: ShapeNode, depth = 0): string {
  switch (shape.kind) {
    case 'value':
      return shape.value === null ? 'null' : typeof shape.value;
    case 'array':
      if (!shape.sample) return '[]';
      return depth >= 3 ? `[… ×${shape.length}]` : `[${renderShape(shape.sample, depth + 1)} ×${shape.length}]`;
    case 'object': {
      if (depth >= 3) return '{…}';
      const fields = Object.entries(shape.fields).map(([key, field]) => `${key}: ${renderShape(field, depth + 1)}`);
      return `{${fields.join(', ')}}`;
    }
  }
}

export function isShapeNode(value: unknown): value is ShapeNode {
  if (!isJsonObject(value)) return false;
  switch (value['kind']) {
    case 'value': {
      const inner = value['value'];
      return inner === null || ['string', 'number', 'boolean'].includes(typeof inner);
    }
    case 'array': {
      const sample = value['sample'];
      return typeof value['length'] === 'number' && (sample === null || isShapeNode(sample));
    }
    case 'object': {
      const fields = value['fields'];
      return isJsonObject(fields) && Object.values(fields).every(isShapeNode);
    }
    default:
      return false;
  }
}
