import { TypeMismatchError } from '../errors';
import { typeTags, type OscArgument } from '../osc/OscMessage';

type ArgValue = number | string | boolean;

/**
 * Arguments after coercion to the declared signature
 */
export class CommandArgs {
  private readonly values: ArgValue[];
  private readonly parameter: string;

  constructor(parameter: string, values: ArgValue[]) {
    this.parameter = parameter;
    this.values = values;
  }

  get length(): number {
    return this.values.length;
  }

  has(index: number): boolean {
    return index < this.values.length;
  }

  number(index: number): number {
    const value = this.values[index];
    if (typeof value !== 'number') {
      throw new TypeMismatchError(this.parameter, `number at ${index}`, describe(value));
    }
    return value;
  }

  string(index: number): string {
    const value = this.values[index];
    if (typeof value !== 'string') {
      throw new TypeMismatchError(this.parameter, `string at ${index}`, describe(value));
    }
    return value;
  }

  boolean(index: number): boolean {
    const value = this.values[index];
    if (typeof value !== 'boolean') {
      throw new TypeMismatchError(this.parameter, `boolean at ${index}`, describe(value));
    }
    return value;
  }
}

/**
 * Check OSC arguments against a signature and coerce them.
 *
 * Signature letters: f number (int or float accepted), i integer,
 * s string, b boolean (T/F or integer 0/1).
 * @param required kinds that must be present
 * @param optional kinds that may follow, in order
 * @throws TypeMismatchError naming the expected and received tags
 */
export function coerceArgs(
  parameter: string,
  args: OscArgument[],
  required: string,
  optional = ''
): CommandArgs {
  const expected = optional ? `${required}[${optional}]` : required;
  const kinds = required + optional;
  const mismatch = () => new TypeMismatchError(parameter, expected, typeTags(args));

  if (args.length < required.length || args.length > kinds.length) {
    throw mismatch();
  }

  const values: ArgValue[] = [];
  args.forEach((arg, i) => {
    const value = coerce(arg, kinds[i]);
    if (value === null) {
      throw mismatch();
    }
    values.push(value);
  });
  return new CommandArgs(parameter, values);
}

function coerce(arg: OscArgument, kind: string): ArgValue | null {
  switch (kind) {
    case 'f':
      if ((arg.type === 'f' || arg.type === 'i' || arg.type === 'd') && Number.isFinite(arg.value)) {
        return arg.value;
      }
      return null;
    case 'i':
      if (arg.type === 'i') return arg.value;
      if ((arg.type === 'f' || arg.type === 'd') && Number.isInteger(arg.value)) return arg.value;
      return null;
    case 's':
      return arg.type === 's' ? arg.value : null;
    case 'b':
      if (arg.type === 'T' || arg.type === 'F') return arg.value;
      if (arg.type === 'i' && (arg.value === 0 || arg.value === 1)) return arg.value === 1;
      return null;
    default:
      return null;
  }
}

function describe(value: ArgValue | undefined): string {
  return value === undefined ? 'nothing' : typeof value;
}
