/**
 * Sets `name` as an own enumerable property. Plain assignment routes
 * `__proto__` to the prototype setter and the variable is lost.
 */
export function defineEntry(target: Record<string, string>, name: string, value: string): void {
  Object.defineProperty(target, name, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  })
}
