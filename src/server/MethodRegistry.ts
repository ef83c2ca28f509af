import Logger from '../logger';
import type { JsonRpcId } from '../protocol/Envelope';
import { RpcRuntimeError } from '../protocol/errors';
import { checkParamDescriptors, type ParamDescriptor, type ParamValues } from './params';

/**
 * Passed to every handler after its bound arguments.
 */
export interface CallContext {
  readonly method: string;
  /** Request id, `undefined` for notifications. */
  readonly id?: JsonRpcId;
  /** Aborts on server shutdown or when the per-dispatch timeout expires. */
  readonly signal: AbortSignal;
  readonly correlationId: string | null;
}

/**
 * 処理名: メソッド記述子
 * 処理概要: RPC メソッドの名前・位置引数の記述子・出力名・ハンドラをまとめた登録単位。
 *          ハンドラの引数型は params のタプルから推論される。エラーは throw / reject で返す。
 */
export interface MethodDescriptor<P extends readonly ParamDescriptor[] = readonly ParamDescriptor[]> {
  name: string;
  description?: string;
  params: P;
  /**
   * Output names. Defaults to a single output; with several outputs the
   * handler returns a tuple of that length.
   */
  results?: readonly string[];
  handler(...args: [...ParamValues<P>, CallContext]): unknown;
}

export interface MethodBinding {
  params: readonly ParamDescriptor[];
  results?: readonly string[];
  description?: string;
  /** Wire name; defaults to the property name. */
  name?: string;
}

export type MethodBindings<R> = { [K in keyof R & string]?: MethodBinding };

export interface MethodInfo {
  name: string;
  description?: string;
  params: { name: string; optional: boolean }[];
  results: string[];
}

/**
 * Immutable binding of a method name to its descriptors and handler.
 */
export interface CallSite {
  readonly name: string;
  readonly params: readonly ParamDescriptor[];
  readonly results: readonly string[];
  invoke(args: readonly unknown[], context: CallContext): unknown;
}

const DEFAULT_RESULTS: readonly string[] = Object.freeze(['result']);

interface RegisteredMethod {
  name: string;
  description?: string;
  params: readonly ParamDescriptor[];
  results: readonly string[];
  invoke(args: readonly unknown[], context: CallContext): unknown;
}

/**
 * 処理名: MethodRegistry クラス
 * 処理概要: メソッド記述子の登録・検証と、初回ディスパッチ時に遅延生成する CallSite のキャッシュを管理します。
 *          CallSite の取得/生成は await を挟まない同期処理のため、同名の並行ディスパッチでも生成は1回だけです。
 */
export class MethodRegistry {
  private readonly descriptors = new Map<string, RegisteredMethod>();
  private readonly callSites = new Map<string, CallSite>();

  /**
   * 処理名: register
   * 処理概要: 記述子を検証して登録します。名前が空・重複、ハンドラが関数でない、
   *          必須引数が省略可能引数の後にある場合は configuration エラーを投げます。
   * @param descriptor 登録するメソッド記述子
   */
  register<const P extends readonly ParamDescriptor[]>(descriptor: MethodDescriptor<P>): this {
    const name = descriptor?.name;
    if (typeof name !== 'string' || name.length === 0) {
      throw RpcRuntimeError.configuration('method name is required');
    }
    if (this.descriptors.has(name)) {
      throw RpcRuntimeError.configuration(`method ${name} is already registered`);
    }
    if (typeof descriptor.handler !== 'function') {
      throw RpcRuntimeError.configuration(`method ${name} has no callable handler`);
    }
    if (!Array.isArray(descriptor.params)) {
      throw RpcRuntimeError.configuration(`method ${name} has no parameter list`);
    }
    const problem = checkParamDescriptors(descriptor.params);
    if (problem) throw RpcRuntimeError.configuration(`method ${name}: ${problem}`);
    if (descriptor.results !== undefined && !Array.isArray(descriptor.results)) {
      throw RpcRuntimeError.configuration(`method ${name}: results must be a list of names`);
    }

    const params: readonly ParamDescriptor[] = descriptor.params;
    this.descriptors.set(name, {
      name,
      description: descriptor.description,
      params,
      results: descriptor.results ?? DEFAULT_RESULTS,
      invoke: (args, context) => Reflect.apply(descriptor.handler, descriptor, [...args, context]),
    });
    Logger.debug('[JSONRPC Dispatcher] registered method', null, { method: name, params: descriptor.params.length });
    return this;
  }

  /**
   * 処理名: expose
   * 処理概要: サーバオブジェクトのメソッドを bindings に従ってまとめて登録します。
   *          ハンドラの this は receiver に束縛されます。
   * @param receiver メソッドを持つオブジェクト
   * @param bindings プロパティ名ごとの引数記述子
   */
  expose<R extends object>(receiver: R, bindings: MethodBindings<R>): this {
    for (const key of Object.keys(bindings)) {
      const binding: MethodBinding | undefined = Reflect.get(bindings, key);
      if (!binding) continue;
      const fn: unknown = Reflect.get(receiver, key);
      if (typeof fn !== 'function') {
        throw RpcRuntimeError.configuration(`receiver has no method ${key}`);
      }
      this.register({
        name: binding.name ?? key,
        description: binding.description,
        params: binding.params,
        results: binding.results,
        handler: (...args: unknown[]) => Reflect.apply(fn, receiver, args),
      });
    }
    return this;
  }

  /** 登録済みのメソッド名なら true。 */
  has(name: string): boolean {
    return this.descriptors.has(name);
  }

  list(): string[] {
    return Array.from(this.descriptors.keys());
  }

  /**
   * 処理名: describe（メソッド一覧の記述）
   * 処理概要: 登録順に各メソッドの名前・説明・引数名と省略可否・結果名を返します。
   * 実装理由: 呼び出し側へ公開 API の一覧を提示する為です。ハンドラ本体は含めません。
   */
  describe(): MethodInfo[] {
    return Array.from(this.descriptors.values()).map((d) => ({
      name: d.name,
      description: d.description,
      params: d.params.map((p) => ({ name: p.name, optional: p.optional })),
      results: [...d.results],
    }));
  }

  /** Number of call sites built so far. */
  get callSiteCount(): number {
    return this.callSites.size;
  }

  /**
   * 処理名: resolve
   * 処理概要: メソッド名に対応する CallSite を返します（未生成なら生成してキャッシュ）。未登録名は undefined。
   * @param name メソッド名
   */
  resolve(name: string): CallSite | undefined {
    const cached = this.callSites.get(name);
    if (cached) return cached;
    const descriptor = this.descriptors.get(name);
    if (!descriptor) return undefined;

    const callSite: CallSite = Object.freeze({
      name,
      params: Object.freeze([...descriptor.params]),
      results: Object.freeze([...descriptor.results]),
      invoke: descriptor.invoke,
    });
    this.callSites.set(name, callSite);
    Logger.debug('[JSONRPC Dispatcher] call site created', null, { method: name });
    return callSite;
  }
}
