import type { TAuthProvider, TOutgoingRequest } from '../../core/types.ts'

export type TAuthFunction = (request: TOutgoingRequest, signal?: AbortSignal) => void | Promise<void>

/** Adapts a plain function to an auth provider. */
export class FunctionAuth implements TAuthProvider {
  private readonly fn: TAuthFunction

  constructor(fn: TAuthFunction) {
    this.fn = fn
  }

  async apply(request: TOutgoingRequest, signal?: AbortSignal): Promise<void> {
    await this.fn(request, signal)
  }
}
