import { RpcError } from '../protocol/errors';

/**
 * Describes one positional parameter of an RPC method.
 *
 * `decode` receives the raw JSON value (never `null` or `undefined`, those are
 * handled by the binder) and returns the typed argument or throws.
 */
export interface ParamDescriptor<T = unknown, O extends boolean = boolean> {
  readonly name: string;
  readonly optional: O;
  decode(value: unknown): T | Promise<T>;
}

export type ParamValue<P> = P extends ParamDescriptor<infer T, infer O> ? (O extends true ? T | undefined : T) : never;

/** Handler argument tuple inferred from a descriptor tuple. */
export type ParamValues<P extends readonly ParamDescriptor[]> = { [K in keyof P]: ParamValue<P[K]> };

/**
 * Thrown by decoders; the binder prefixes the argument index.
 */
export class ParamDecodeError extends Error {
  constructor(message: string, readonly details?: unknown) {
    super(message);
    this.name = 'ParamDecodeError';
  }
}

function typeName(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function expect(expected: string, value: unknown): never {
  throw new ParamDecodeError(`expected ${expected}, got ${typeName(value)}`);
}

function required<T>(name: string, decode: (value: unknown) => T | Promise<T>): ParamDescriptor<T, false> {
  if (!name) throw new Error('parameter name is required');
  return { name, optional: false, decode };
}

/**
 * 処理名: 関数スキーマ
 * 処理概要: `{ valid, errors }` を返すカスタムバリデータ（同期/非同期）。
 */
export type FunctionSchema = (value: unknown) => FunctionSchemaResult | Promise<FunctionSchemaResult>;

export interface FunctionSchemaResult {
  valid: boolean;
  errors?: unknown;
}

/**
 * 処理名: validate メソッド形式スキーマ
 * 処理概要: Joi 風の `validate(value) -> { error, value }` を持つスキーマ。
 */
export interface ValidateSchema<T> {
  validate(value: unknown): ValidateSchemaResult<T> | Promise<ValidateSchemaResult<T>>;
}

export interface ValidateSchemaResult<T> {
  error?: unknown;
  value: T;
}

function schemaMessage(errors: unknown): string {
  if (errors instanceof Error) return errors.message;
  if (typeof errors === 'string') return errors;
  if (Array.isArray(errors) && errors.length > 0) return errors.map((e) => schemaMessage(e)).join('; ');
  return 'schema validation failed';
}

async function validateWithFunctionSchema(schemaFn: FunctionSchema, value: unknown): Promise<unknown> {
  const res = await schemaFn(value);
  if (res.valid === false) throw new ParamDecodeError(schemaMessage(res.errors), res.errors);
  return value;
}

async function validateWithValidateMethod<T>(schema: ValidateSchema<T>, value: unknown): Promise<T> {
  const res = await schema.validate(value);
  if (res.error) throw new ParamDecodeError(schemaMessage(res.error), res.error);
  return res.value;
}

function schemaParam<T>(name: string, schema: ValidateSchema<T>): ParamDescriptor<T, false>;
function schemaParam(name: string, schema: FunctionSchema): ParamDescriptor<unknown, false>;
function schemaParam<T>(name: string, schema: ValidateSchema<T> | FunctionSchema): ParamDescriptor<unknown, false> {
  if (typeof schema === 'function') {
    return required(name, (value) => validateWithFunctionSchema(schema, value));
  }
  return required(name, (value) => validateWithValidateMethod(schema, value));
}

/**
 * Builders for the common JSON parameter kinds. Wrap a builder with
 * {@link optional} to accept a missing or `null` argument.
 */
export const param = {
  string(name: string): ParamDescriptor<string, false> {
    return required(name, (v) => (typeof v === 'string' ? v : expect('string', v)));
  },

  number(name: string): ParamDescriptor<number, false> {
    return required(name, (v) => (typeof v === 'number' && Number.isFinite(v) ? v : expect('number', v)));
  },

  integer(name: string): ParamDescriptor<number, false> {
    return required(name, (v) => (typeof v === 'number' && Number.isInteger(v) ? v : expect('integer', v)));
  },

  boolean(name: string): ParamDescriptor<boolean, false> {
    return required(name, (v) => (typeof v === 'boolean' ? v : expect('boolean', v)));
  },

  object<T extends object = Record<string, unknown>>(
    name: string,
    guard?: (value: Record<string, unknown>) => value is T & Record<string, unknown>,
  ): ParamDescriptor<T | Record<string, unknown>, false> {
    return required(name, (v) => {
      if (typeof v !== 'object' || v === null || Array.isArray(v)) return expect('object', v);
      const obj: Record<string, unknown> = { ...v };
      if (guard && !guard(obj)) throw new ParamDecodeError('object does not match the expected shape');
      return obj;
    });
  },

  array<T = unknown>(name: string, item?: (value: unknown, index: number) => T): ParamDescriptor<T[] | unknown[], false> {
    return required(name, (v) => {
      if (!Array.isArray(v)) return expect('array', v);
      if (!item) return [...v];
      return v.map((el, i) => {
        try {
          return item(el, i);
        } catch (err) {
          throw new ParamDecodeError(`element ${i}: ${err instanceof Error ? err.message : String(err)}`);
        }
      });
    });
  },

  any(name: string): ParamDescriptor<unknown, false> {
    return required(name, (v) => v);
  },

  custom<T>(name: string, decode: (value: unknown) => T | Promise<T>): ParamDescriptor<T, false> {
    return required(name, decode);
  },

  schema: schemaParam,
};

/**
 * Mark a parameter as optional. Missing trailing arguments and JSON `null`
 * bind as `undefined`.
 */
export function optional<T>(descriptor: ParamDescriptor<T, boolean>): ParamDescriptor<T, true> {
  return { name: descriptor.name, optional: true, decode: (value) => descriptor.decode(value) };
}

/**
 * Validate a descriptor list at registration: names present and no required
 * parameter after an optional one.
 */
export function checkParamDescriptors(params: readonly ParamDescriptor[]): string | undefined {
  let sawOptional = false;
  for (let i = 0; i < params.length; i++) {
    const p = params[i];
    if (!p || typeof p.decode !== 'function') return `parameter ${i} has no decoder`;
    if (!p.name) return `parameter ${i} has no name`;
    if (p.optional) {
      sawOptional = true;
    } else if (sawOptional) {
      return `required parameter ${i} (${p.name}) follows an optional one`;
    }
  }
  return undefined;
}

/**
 * 処理名: 位置引数バインド (bindParams)
 * 処理概要: params 配列を宣言順にパラメータ記述子へ照合してデコードする。
 *          省略可能な末尾引数の欠落は undefined で補い、必須引数の欠落・引数過多・
 *          デコード失敗は該当インデックスを含む InvalidParams エラーとして投げる。
 * @param params 受信した params（未指定の場合あり）
 * @param descriptors メソッドの入力パラメータ記述子
 */
export async function bindParams(params: readonly unknown[] | undefined, descriptors: readonly ParamDescriptor[]): Promise<unknown[]> {
  const raw = params ?? [];
  if (raw.length > descriptors.length) {
    throw RpcError.invalidParams(`too many arguments, want at most ${descriptors.length}`);
  }

  const args: unknown[] = [];
  for (let i = 0; i < descriptors.length; i++) {
    const descriptor = descriptors[i];
    const value = i < raw.length ? raw[i] : undefined;
    if (value === undefined || value === null) {
      if (!descriptor.optional) throw RpcError.invalidParams(`missing value for required argument ${i}`);
      args.push(undefined);
      continue;
    }
    try {
      args.push(await descriptor.decode(value));
    } catch (err) {
      if (err instanceof RpcError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      const data = err instanceof ParamDecodeError ? err.details : undefined;
      throw RpcError.invalidParams(`invalid argument ${i}: ${reason}`, data);
    }
  }
  return args;
}
