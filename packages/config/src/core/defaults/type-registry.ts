import type { TypeDescriptor } from "../../ports/subset"
import { ConfigError } from "../errors/config-error"

/**
 * Maps discriminator values to the types they name.
 */
export class TypeRegistry {
  private readonly types = new Map<string, TypeDescriptor>()

  constructor(types: Readonly<Record<string, TypeDescriptor>> = {}) {
    for (const [name, descriptor] of Object.entries(types)) {
      this.register(name, descriptor)
    }
  }

  register(name: string, descriptor: TypeDescriptor): this {
    this.types.set(name, descriptor)
    return this
  }

  has(name: string): boolean {
    return this.types.has(name)
  }

  lookup(name: string, kind?: string): TypeDescriptor {
    const descriptor = this.types.get(name)
    if (!descriptor) throw ConfigError.unknownType(name, kind)

    return descriptor
  }

  names(): string[] {
    return [...this.types.keys()]
  }
}
