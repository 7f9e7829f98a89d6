/**
 * A class used as a type marker: every error whose prototype chain contains
 * the class matches it.
 */
export type ErrorClass = abstract new (...args: never[]) => unknown;

/**
 * Either a class (type marker) or a specific value such as a sentinel error.
 */
export type ErrorIdentity = ErrorClass | object | string | number | boolean | bigint | symbol;

export function isErrorClass(identity: unknown): identity is ErrorClass {
  return typeof identity === 'function';
}

/**
 * IdentityTable - Two-level lookup keyed by error identity.
 *
 * Values are matched by identity before types, so a specific sentinel can
 * override a handler registered for its whole class. Type lookup walks the
 * prototype chain of the error, nearest class first.
 *
 * Tables are populated at startup and only read while serving traffic.
 */
export class IdentityTable<V> {
  private readonly byValue = new Map<unknown, V>();
  private readonly byType = new Map<unknown, V>();

  set(identity: unknown, value: V): void {
    if (identity === null || identity === undefined) {
      // Nothing to key on
      return;
    }
    if (isErrorClass(identity)) {
      this.byType.set(identity, value);
    } else {
      this.byValue.set(identity, value);
    }
  }

  get(err: unknown): V | undefined {
    if (err === null || err === undefined) {
      return undefined;
    }
    if (this.byValue.has(err)) {
      return this.byValue.get(err);
    }
    return this.getByType(err);
  }

  has(err: unknown): boolean {
    return this.get(err) !== undefined;
  }

  clear(): void {
    this.byValue.clear();
    this.byType.clear();
  }

  private getByType(err: unknown): V | undefined {
    if (typeof err !== 'object' || err === null || this.byType.size === 0) {
      return undefined;
    }
    let proto: unknown = Object.getPrototypeOf(err);
    while (typeof proto === 'object' && proto !== null) {
      if (Object.prototype.hasOwnProperty.call(proto, 'constructor')) {
        const ctor: unknown = Reflect.get(proto, 'constructor');
        const match = this.byType.get(ctor);
        if (match !== undefined) {
          return match;
        }
      }
      proto = Object.getPrototypeOf(proto);
    }
    return undefined;
  }
}
