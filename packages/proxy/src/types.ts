/**
 * Run-time type tokens.
 *
 * TypeScript types are erased, so every parameter and return type of a
 * contract method is described by a {@link TypeToken}. Tokens drive
 * signature keys, delegate checks at construction and the compatibility
 * check between a method and the target its resolver returns.
 *
 * @module
 */

/**
 * Kind of value a token describes. The first four are primitive: they have a
 * non-null default value and never accept `null`.
 */
export type TypeKind =
  | "void"
  | "boolean"
  | "int"
  | "double"
  | "string"
  | "object"
  | "array"
  | "contract"
  | "class";

/**
 * A run-time description of a type.
 *
 * @typeParam T - The static type of values the token accepts.
 */
export interface TypeToken<T = unknown> {
  readonly kind: TypeKind;
  /** Display name used in descriptors, e.g. `int` or `Foo[]` */
  readonly name: string;
  /** Identity-unique key used in signature keys */
  readonly id: string;
  readonly primitive: boolean;
  /** Value introduced where a `void` result is adapted to this type */
  readonly defaultValue: unknown;
  /** Element token of an `array` token */
  readonly component?: TypeToken;
  accepts(value: unknown): value is T;
}

const INT_MIN = -0x80000000;
const INT_MAX = 0x7fffffff;

let nextReferenceId = 0;

function primitiveToken<T>(
  kind: TypeKind,
  defaultValue: unknown,
  accepts: (value: unknown) => boolean
): TypeToken<T> {
  return {
    kind,
    name: kind,
    id: kind,
    primitive: true,
    defaultValue,
    accepts: (value: unknown): value is T => accepts(value),
  };
}

/**
 * Create a reference token. References accept `null` and `undefined`.
 */
export function referenceToken<T>(
  kind: TypeKind,
  name: string,
  accepts: (value: unknown) => boolean,
  extra: { component?: TypeToken; id?: string } = {}
): TypeToken<T> {
  return {
    kind,
    name,
    id: extra.id ?? `${name}#${++nextReferenceId}`,
    primitive: false,
    defaultValue: null,
    component: extra.component,
    accepts: (value: unknown): value is T =>
      value === null || value === undefined || accepts(value),
  };
}

const classIds = new WeakMap<object, string>();

/**
 * Built-in tokens and token factories.
 */
export const Types = {
  void: primitiveToken<void>("void", undefined, (v) => v === undefined),
  boolean: primitiveToken<boolean>("boolean", false, (v) => typeof v === "boolean"),
  int: primitiveToken<number>(
    "int",
    0,
    (v) => typeof v === "number" && Number.isInteger(v) && v >= INT_MIN && v <= INT_MAX
  ),
  double: primitiveToken<number>("double", 0, (v) => typeof v === "number"),
  string: referenceToken<string>("string", "string", (v) => typeof v === "string", {
    id: "string",
  }),
  object: referenceToken<unknown>("object", "object", () => true, { id: "object" }),

  /**
   * Token of an array whose elements `component` accepts. Varargs methods
   * declare their last parameter with it.
   */
  arrayOf<T>(component: TypeToken<T>): TypeToken<T[]> {
    return referenceToken<T[]>(
      "array",
      `${component.name}[]`,
      (v) => Array.isArray(v) && v.every((element) => component.accepts(element)),
      { component, id: `${component.id}[]` }
    );
  },

  /**
   * Token of instances of a class.
   */
  instanceOf<T>(ctor: abstract new (...args: never[]) => T): TypeToken<T> {
    const name = ctor.name || "anonymous";
    let id = classIds.get(ctor);
    if (id === undefined) {
      id = `${name}#${++nextReferenceId}`;
      classIds.set(ctor, id);
    }
    return referenceToken<T>("class", name, (v) => v instanceof ctor, { id });
  },
};

/**
 * Tokens are compared by `id`: factories may hand out distinct token objects
 * for the same type.
 */
export function sameType(a: TypeToken, b: TypeToken): boolean {
  return a.id === b.id;
}

/**
 * Whether a value described by `from` can be passed where `to` is expected.
 *
 * Identity, widening `int` to `double`, boxing a primitive into `object`,
 * unboxing `object`, and any conversion between references (like a checked
 * cast, it is not verified ahead of the call). `void` converts both ways: a
 * void result is replaced by the target's default value, and any result can
 * be discarded.
 */
export function isConvertible(from: TypeToken, to: TypeToken): boolean {
  if (sameType(from, to)) return true;
  if (to.kind === "void" || from.kind === "void") return true;

  if (from.primitive && to.primitive) {
    return from.kind === "int" && to.kind === "double";
  }
  if (from.primitive) {
    return sameType(to, Types.object);
  }
  if (to.primitive) {
    return sameType(from, Types.object);
  }
  return true;
}

// ============================================================================
// Method types
// ============================================================================

/**
 * Return type and parameter types of a method or target.
 */
export class MethodType {
  readonly parameterTypes: readonly TypeToken[];

  constructor(
    readonly returnType: TypeToken,
    parameterTypes: readonly TypeToken[] = []
  ) {
    this.parameterTypes = Object.freeze([...parameterTypes]);
  }

  get parameterCount(): number {
    return this.parameterTypes.length;
  }

  parameterType(index: number): TypeToken {
    const type = this.parameterTypes[index];
    if (type === undefined) {
      throw new RangeError(`no parameter ${index} in ${this.toString()}`);
    }
    return type;
  }

  insertParameterTypes(index: number, ...types: TypeToken[]): MethodType {
    if (index < 0 || index > this.parameterTypes.length) {
      throw new RangeError(`cannot insert at ${index} in ${this.toString()}`);
    }
    const params = [...this.parameterTypes];
    params.splice(index, 0, ...types);
    return new MethodType(this.returnType, params);
  }

  dropParameterTypes(start: number, end: number): MethodType {
    if (start < 0 || end > this.parameterTypes.length || start > end) {
      throw new RangeError(`cannot drop [${start}, ${end}) from ${this.toString()}`);
    }
    const params = [...this.parameterTypes];
    params.splice(start, end - start);
    return new MethodType(this.returnType, params);
  }

  changeReturnType(returnType: TypeToken): MethodType {
    return new MethodType(returnType, this.parameterTypes);
  }

  equals(other: MethodType): boolean {
    return (
      sameType(this.returnType, other.returnType) &&
      this.parameterTypes.length === other.parameterTypes.length &&
      this.parameterTypes.every((type, i) => sameType(type, other.parameterTypes[i]))
    );
  }

  /**
   * Key that distinguishes method types by token identity.
   */
  key(): string {
    return `(${this.parameterTypes.map((t) => t.id).join(",")})${this.returnType.id}`;
  }

  toString(): string {
    return `(${this.parameterTypes.map((t) => t.name).join(",")})${this.returnType.name}`;
  }
}

export function methodType(returnType: TypeToken, parameterTypes: readonly TypeToken[] = []): MethodType {
  return new MethodType(returnType, parameterTypes);
}
