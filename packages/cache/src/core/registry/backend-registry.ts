import type { BackendFactory } from "../../ports/cache-backend"
import { ConfigurationError, UnknownBackendError } from "../errors"
import type { ProxyBackend } from "../region/proxy-backend"

export type ProxyFactory = () => ProxyBackend

/**
 * Maps symbolic names to backend and proxy factories.
 *
 * Registration is idempotent: registering a name again replaces its factory.
 */
export class BackendRegistry {
  private readonly backends = new Map<string, BackendFactory>()
  private readonly proxies = new Map<string, ProxyFactory>()

  register(name: string, factory: BackendFactory): this {
    this.backends.set(name, factory)
    return this
  }

  has(name: string): boolean {
    return this.backends.has(name)
  }

  names(): string[] {
    return [...this.backends.keys()]
  }

  resolve(name: string): BackendFactory {
    const factory = this.backends.get(name)
    if (factory === undefined) throw new UnknownBackendError(name)
    return factory
  }

  registerProxy(name: string, factory: ProxyFactory): this {
    this.proxies.set(name, factory)
    return this
  }

  resolveProxy(name: string): ProxyFactory {
    const factory = this.proxies.get(name)

    if (factory === undefined) {
      throw new ConfigurationError(`No cache proxy registered under "${name}"`, {
        context: { proxy: name },
      })
    }

    return factory
  }
}
