/**
 * Renders an element for log lines and `Counter.toString()`.
 */
export function printValue(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'bigint':
      return `${value}n`;
    case 'symbol':
    case 'function':
      return value.toString();
    case 'object':
      if (value === null) {
        return 'null';
      }
      return printObject(value);
    default:
      return String(value);
  }
}

function printObject(value: object): string {
  try {
    return JSON.stringify(value) ?? Object.prototype.toString.call(value);
  } catch {
    // Cycles, nested bigints, throwing getters or toJSON. Only used for
    // display, so fall back to the tag.
    return Object.prototype.toString.call(value);
  }
}
