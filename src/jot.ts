export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

class StringNode implements JotSchema<string> {
  constructor(readonly options: { coerceNumber?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): string {
    if (this.options.coerceNumber && typeof value === 'number' && Number.isFinite(value)) {
      return String(value);
    }
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }

    return value;
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class RecordNode<T> implements JotSchema<Record<string, T>> {
  constructor(readonly valueNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): Record<string, T> {
    if (!isPlainObject(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, T> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = this.valueNode.parse(item, `${path}.${key}`);
    }
    return result;
  }
}

/** Missing and null both read as `undefined`. */
class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    if (value === undefined || value === null) {
      return undefined;
    }
    return this.inner.parse(value, path);
  }
}

/** Unknown keys are ignored; platform payloads carry far more than we read. */
class ObjectNode<Shape extends Record<string, JotSchema<unknown>>>
  implements JotSchema<{ [K in keyof Shape]: InferJot<Shape[K]> }>
{
  constructor(readonly shape: Shape) {}

  parse(value: unknown, path: string = 'value'): { [K in keyof Shape]: InferJot<Shape[K]> } {
    if (!isPlainObject(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as { [K in keyof Shape]: InferJot<Shape[K]> };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export const jot = {
  string: (options?: { coerceNumber?: boolean }): JotSchema<string> => new StringNode(options),
  number: (): JotSchema<number> => new NumberNode(),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  record: <T>(schema: JotSchema<T>): JotSchema<Record<string, T>> => new RecordNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape) => new ObjectNode(shape),
};

/** Parses JSON text against a schema, naming the payload in the error. */
export function parseJson<T>(raw: string, schema: JotSchema<T>, name: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new SyntaxError(`${name} is not valid JSON`, { cause: error });
  }
  return schema.parse(parsed, name);
}
