/**
 * Contracts shared by the proxy tests.
 */

import { Types, abstractMethod, defaultMethod, defineContract } from "../index.js";

export interface IntBinaryOperator {
  applyAsInt(left: number, right: number): number;
}

export const IntBinaryOperator = defineContract<IntBinaryOperator>({
  name: "IntBinaryOperator",
  methods: [abstractMethod("applyAsInt", [Types.int, Types.int], Types.int)],
});

export interface Hello {
  hello(text: string): string;
}

export const Hello = defineContract<Hello>({
  name: "Hello",
  methods: [abstractMethod("hello", [Types.string], Types.string)],
});

export interface IntSupplier {
  getAsInt(): number;
}

export const IntSupplier = defineContract<IntSupplier>({
  name: "IntSupplier",
  methods: [abstractMethod("getAsInt", [], Types.int)],
});

export interface Doubler {
  value(): number;
  multiplyBy2(): number;
}

export const Doubler = defineContract<Doubler>({
  name: "Doubler",
  methods: [
    abstractMethod("value", [], Types.int),
    defaultMethod("multiplyBy2", [], Types.int, function (this: Doubler) {
      return this.value() * 2;
    }),
  ],
});

export interface Foo {
  bar(x: number, label: string): void;
}

export const Foo = defineContract<Foo>({
  name: "Foo",
  methods: [abstractMethod("bar", [Types.double, Types.string], Types.void)],
});

export interface Joiner {
  join(separator: string, ...parts: string[]): string;
}

export const Joiner = defineContract<Joiner>({
  name: "Joiner",
  methods: [
    abstractMethod("join", [Types.string, Types.arrayOf(Types.string)], Types.string, { varargs: true }),
  ],
});

export interface Calculator {
  add(left: number, right: number): number;
  sub(left: number, right: number): number;
}

export const Calculator = defineContract<Calculator>({
  name: "Calculator",
  methods: [
    abstractMethod("add", [Types.int, Types.int], Types.int),
    abstractMethod("sub", [Types.int, Types.int], Types.int),
  ],
});
