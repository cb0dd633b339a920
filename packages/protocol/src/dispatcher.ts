import { formatErrors, invalidParams, unknownMethod } from "@teamwire/schemas";
import type { ParamsValidators } from "@teamwire/schemas";

export type MethodHandler<T, Ctx> = (params: T, ctx: Ctx) => unknown;

export type HandlerTable<P extends object, Ctx> = { [M in keyof P]: MethodHandler<P[M], Ctx> };

/**
 * Routes a decoded call to the handler registered for its method.
 *
 * The method set is closed: it is exactly the keys of `P`. Anything else
 * is rejected with `UnknownMethod`, and params that fail their schema
 * are rejected with `InvalidParams` before a handler ever runs.
 */
export class Dispatcher<P extends object, Ctx> {
  private handlers: HandlerTable<P, Ctx>;
  private validators: ParamsValidators<P>;

  constructor(handlers: HandlerTable<P, Ctx>, validators: ParamsValidators<P>) {
    this.handlers = handlers;
    this.validators = validators;
  }

  isMethod(method: string): method is Extract<keyof P, string> {
    return Object.hasOwn(this.handlers, method);
  }

  methods(): string[] {
    return Object.keys(this.handlers);
  }

  async dispatch(method: string, params: unknown, ctx: Ctx): Promise<unknown> {
    if (!this.isMethod(method)) {
      throw unknownMethod(method);
    }
    return this.invoke(method, params, ctx);
  }

  private async invoke<M extends Extract<keyof P, string>>(method: M, params: unknown, ctx: Ctx): Promise<unknown> {
    const validate = this.validators[method];
    if (!validate(params)) {
      throw invalidParams(method, formatErrors(validate.errors));
    }
    const handler = this.handlers[method];
    return handler(params, ctx);
  }
}
