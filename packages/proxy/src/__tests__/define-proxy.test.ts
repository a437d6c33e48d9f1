import { describe, it, expect, vi } from "vitest";
import { AccessError, ArgumentError, LinkageError } from "@lazyproxy/core";
import {
  OverridePolicies,
  ProxyBase,
  Types,
  emitBackend,
  tableBackend,
  defineContract,
  abstractMethod,
  defineProxy,
  lookup,
  publicLookup,
  targets,
  type LinkRequest,
  type MethodInfo,
  type Target,
  type TypeSynthesisBackend,
} from "../index.js";
import { Calculator, Doubler, Foo, Hello, IntBinaryOperator, IntSupplier } from "./fixtures.js";

const app = lookup("app");
const backends: TypeSynthesisBackend[] = [emitBackend, tableBackend];

describe("defineProxy", () => {
  // ---------------------------------------------------------------------------
  // Linking
  // ---------------------------------------------------------------------------

  describe("linking", () => {
    it("should implement an operator through its resolver", () => {
      const Sum = defineProxy(app, [IntBinaryOperator], {
        resolver: () => (_proxy: unknown, left: number, right: number) => left + right,
      });
      const sum = Sum.newInstance();

      expect(sum.applyAsInt(3, 5)).toBe(8);
      expect(sum.applyAsInt(2, 3)).toBe(5);
      expect(sum).toBeInstanceOf(ProxyBase);
      expect(sum).toBeInstanceOf(Sum.type);
    });

    it("should consult the resolver once per method across instances", () => {
      const resolve = vi.fn((): Target => (_proxy: unknown, left: number, right: number) => left * right);
      const Product = defineProxy(app, [IntBinaryOperator], { resolver: resolve });

      const first = Product.newInstance();
      const second = Product.newInstance();
      expect(resolve).not.toHaveBeenCalled();

      expect(first.applyAsInt(2, 3)).toBe(6);
      expect(second.applyAsInt(4, 5)).toBe(20);
      expect(first.applyAsInt(6, 7)).toBe(42);
      expect(resolve).toHaveBeenCalledTimes(1);
    });

    it("should keep the resolvers of two types apart", () => {
      const Sum = defineProxy(app, [IntBinaryOperator], {
        resolver: () => (_proxy: unknown, left: number, right: number) => left + right,
      });
      const Difference = defineProxy(app, [IntBinaryOperator], {
        resolver: () => (_proxy: unknown, left: number, right: number) => left - right,
      });

      expect(Sum.type).not.toBe(Difference.type);
      expect(Sum.newInstance().applyAsInt(5, 3)).toBe(8);
      expect(Difference.newInstance().applyAsInt(5, 3)).toBe(2);
    });

    it("should forward to a delegate", () => {
      const Delegating = defineProxy(app, [Hello], {
        delegate: Hello.token,
        resolver: (request) =>
          targets.dropArguments(
            targets.invokeVirtual(Hello.token, request.name, request.methodType),
            0,
            request.declaringContract.token
          ),
      });
      const proxy = Delegating.newInstance({ hello: (text: string) => `* ${text} *` });

      expect(proxy.hello("hello")).toBe("* hello *");
    });

    it("should pass the proxy as receiver", () => {
      const Repeater = defineProxy(app, [Hello], {
        delegate: Types.int,
        resolver: () => (proxy: unknown, times: number, text: string) =>
          proxy instanceof ProxyBase ? text.repeat(times) : "not a proxy",
      });

      expect(Repeater.newInstance(2).hello("proxy")).toBe("proxyproxy");
    });

    it("should discard the result of void methods", () => {
      const seen: unknown[] = [];
      const Recorder = defineProxy(app, [Foo], {
        resolver: () => (_proxy: unknown, x: number, label: string) => seen.push([x, label]),
      });

      expect(Recorder.newInstance().bar(1.5, "x")).toBeUndefined();
      expect(seen).toEqual([[1.5, "x"]]);
    });

    it("should implement several contracts", () => {
      const Both = defineProxy(app, [IntSupplier, Hello], {
        delegate: Types.int,
        resolver: (request: LinkRequest): Target =>
          request.name === "getAsInt"
            ? (_proxy: unknown, delegate: number) => delegate
            : (_proxy: unknown, delegate: number, text: string) => `${text}:${delegate}`,
      });
      const both = Both.newInstance(7);

      expect(both.getAsInt()).toBe(7);
      expect(both.hello("n")).toBe("n:7");
    });
  });

  // ---------------------------------------------------------------------------
  // Universal operations
  // ---------------------------------------------------------------------------

  describe.each(backends)("universal operations ($name backend)", (backend) => {
    it("should keep identity semantics under the none policy", () => {
      const resolve = vi.fn((_request: LinkRequest): Target => (_proxy: unknown, delegate: number) => delegate);
      const Supplier = defineProxy(app, [IntSupplier], { resolver: resolve, delegate: Types.int, backend });
      const a = Supplier.newInstance(42);
      const b = Supplier.newInstance(42);

      expect(a.equals(a)).toBe(true);
      expect(a.equals(b)).toBe(false);
      expect(a.equals("x")).toBe(false);
      expect(a.hashCode()).toBe(a.hashCode());
      expect(a.toString()).toMatch(/^IntSupplier\$\$Proxy@[0-9a-f]+$/);
      expect(resolve).not.toHaveBeenCalled();

      expect(a.getAsInt()).toBe(42);
      expect(resolve.mock.calls.map(([request]) => request.name)).toEqual(["getAsInt"]);
    });

    it("should link them when the policy asks", () => {
      const Supplier = defineProxy(app, [IntSupplier], {
        backend,
        delegate: Types.int,
        overridePolicy: OverridePolicies.universal,
        resolver: (request: LinkRequest): Target => {
          switch (request.name) {
            case "equals":
              return (proxy: unknown, _delegate: number, other: unknown) => proxy === other;
            case "hashCode":
              return (_proxy: unknown, delegate: number) => delegate;
            case "toString":
              return (_proxy: unknown, _delegate: number) => "proxy";
            default:
              return (_proxy: unknown, delegate: number) => delegate;
          }
        },
      });
      const proxy = Supplier.newInstance(42);

      expect(proxy.getAsInt()).toBe(42);
      expect(proxy.hashCode()).toBe(42);
      expect(proxy.toString()).toBe("proxy");
      expect(`${proxy}`).toBe("proxy");
      expect(proxy.equals(proxy)).toBe(true);
      expect(proxy.equals(Supplier.newInstance(42))).toBe(false);
      expect(proxy.equals("x")).toBe(false);
    });
  });

  // ---------------------------------------------------------------------------
  // Default methods
  // ---------------------------------------------------------------------------

  describe.each(backends)("default methods ($name backend)", (backend) => {
    it("should keep the default body", () => {
      const resolve = vi.fn((_request: LinkRequest): Target => (_proxy: unknown) => 42);
      const Kept = defineProxy(app, [Doubler], { resolver: resolve, backend });

      expect(Kept.newInstance().multiplyBy2()).toBe(84);
      expect(resolve.mock.calls.map(([request]) => request.name)).toEqual(["value"]);
    });

    it("should link a default method the resolver overrides", () => {
      const overrideDefaultMethod = vi.fn((method: MethodInfo) => method.name === "multiplyBy2");
      const Overridden = defineProxy(app, [Doubler], {
        backend,
        resolver: {
          resolve: (request) =>
            request.name === "multiplyBy2" ? (_proxy: unknown) => 64 : (_proxy: unknown) => 21,
          overrideDefaultMethod,
        },
      });

      expect(overrideDefaultMethod).toHaveBeenCalledTimes(1);
      expect(Overridden.newInstance().multiplyBy2()).toBe(64);
      expect(Overridden.newInstance().value()).toBe(21);
      expect(overrideDefaultMethod).toHaveBeenCalledTimes(1);
    });

    it("should let a resolver reuse the default body", () => {
      const Reused = defineProxy(app, [Doubler], {
        backend,
        overridePolicy: OverridePolicies.defaults,
        resolver: (request) => (request.isDefault ? targets.invokeDefault(request) : (_proxy: unknown) => 5),
      });

      expect(Reused.newInstance().multiplyBy2()).toBe(10);
    });
  });

  // ---------------------------------------------------------------------------
  // Failures
  // ---------------------------------------------------------------------------

  describe("link failures", () => {
    it("should fail one method without affecting the others", () => {
      const Calc = defineProxy(app, [Calculator], {
        resolver: (request) =>
          request.name === "add"
            ? (_proxy: unknown, a: number, b: number) => a + b
            : (a: number, b: number) => a - b,
      });
      const calculator = Calc.newInstance();

      expect(calculator.add(1, 2)).toBe(3);
      expect(() => calculator.sub(3, 1)).toThrow(LinkageError);
      expect(calculator.add(2, 2)).toBe(4);
      expect(() => calculator.sub(3, 1)).toThrow(
        "target of Calculator.sub(int,int)int takes 2 arguments, expected 3 (Calculator,int,int)int"
      );
    });

    it("should reject a re-entrant call from the resolver", () => {
      let proxy: IntBinaryOperator | undefined;
      let reenter = true;
      const Reentrant = defineProxy(app, [IntBinaryOperator], {
        resolver: () => {
          if (reenter) {
            reenter = false;
            proxy?.applyAsInt(0, 0);
          }
          return (_proxy: unknown, a: number, b: number) => a + b;
        },
      });
      proxy = Reentrant.newInstance();

      expect(() => proxy?.applyAsInt(1, 2)).toThrow(
        "IntBinaryOperator.applyAsInt(int,int)int was called while its target is being resolved"
      );
      expect(proxy.applyAsInt(1, 2)).toBe(3);
    });

    it("should bind once when many tasks race for the first call", async () => {
      const resolve = vi.fn((): Target => (_proxy: unknown, a: number, b: number) => a + b);
      const Raced = defineProxy(app, [IntBinaryOperator], { resolver: resolve });
      const proxies = [Raced.newInstance(), Raced.newInstance()];

      let release: () => void = () => undefined;
      const barrier = new Promise<void>((resolveBarrier) => {
        release = resolveBarrier;
      });
      const tasks = Array.from({ length: 8 }, async (_, i) => {
        await barrier;
        return proxies[i % 2]?.applyAsInt(i, 1);
      });
      release();

      expect(await Promise.all(tasks)).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
      expect(resolve).toHaveBeenCalledTimes(1);
    });
  });

  // ---------------------------------------------------------------------------
  // Generation errors
  // ---------------------------------------------------------------------------

  describe("generation errors", () => {
    const resolver = (): Target => (_proxy: unknown) => 0;

    it("should reject lookups without full privilege", () => {
      expect(() => defineProxy(publicLookup(), [IntSupplier], { resolver })).toThrow(AccessError);
    });

    it("should reject contracts the lookup cannot see", () => {
      const Hidden = defineContract({
        name: "Hidden",
        module: "secret",
        exported: false,
        methods: [abstractMethod("run", [], Types.void)],
      });

      expect(() => defineProxy(app, [Hidden], { resolver })).toThrow(
        new AccessError("contract secret/Hidden is not visible from lookup(app)")
      );
      expect(defineProxy(lookup("secret"), [Hidden], { resolver }).name).toBe("Hidden$$Proxy");
    });

    it("should reject a missing lookup or resolver", () => {
      expect(() => Reflect.apply(defineProxy, undefined, [null, [IntSupplier], { resolver }])).toThrow(
        new ArgumentError("a lookup is required")
      );
      expect(() => Reflect.apply(defineProxy, undefined, [app, [IntSupplier], {}])).toThrow(
        new ArgumentError("a resolver is required")
      );
      expect(() => Reflect.apply(defineProxy, undefined, [app, [IntSupplier]])).toThrow(
        "options with a resolver are required"
      );
      expect(() => Reflect.apply(defineProxy, undefined, [app, IntSupplier, { resolver }])).toThrow(
        "contracts must be an array"
      );
    });

    it("should reject invalid options", () => {
      const misspelled = { resolver, delegateType: Types.int };
      expect(() => defineProxy(app, [IntSupplier], misspelled)).toThrow("unknown option 'delegateType'");

      expect(() =>
        Reflect.apply(defineProxy, undefined, [app, [IntSupplier], { resolver, overridePolicy: "all" }])
      ).toThrow("overridePolicy must be a function");
      expect(() =>
        Reflect.apply(defineProxy, undefined, [app, [IntSupplier], { resolver, delegate: "int" }])
      ).toThrow("delegate must be a type token");
      expect(() => defineProxy(app, [IntSupplier], { resolver, delegate: Types.void })).toThrow(
        "a delegate cannot be void"
      );
      expect(() => defineProxy(app, [IntSupplier], { resolver, backend: "wasm" })).toThrow(
        "unknown type synthesis backend 'wasm'"
      );
    });

    it("should reject invalid type names", () => {
      expect(() => defineProxy(app, [IntSupplier], { resolver, name: "not valid" })).toThrow(
        new ArgumentError("'not valid' is not a valid type name")
      );
    });

    it.each(["class", "default", "let", "yield", "eval", "arguments"])(
      "should reject the reserved name '%s'",
      (name) => {
        expect(() => defineProxy(app, [IntSupplier], { resolver, name })).toThrow(
          new ArgumentError(`'${name}' is not a valid type name`)
        );
      }
    );

    it("should accept contextual keywords as type names", () => {
      const Typed = defineProxy(app, [IntSupplier], { resolver: () => (_proxy: unknown) => 1, name: "type" });

      expect(Typed.type.name).toBe("type");
      expect(Typed.newInstance().getAsInt()).toBe(1);
    });

    it("should reject an empty contract list", () => {
      expect(() => defineProxy(app, [], { resolver })).toThrow("at least one contract is required");
    });
  });

  // ---------------------------------------------------------------------------
  // Options
  // ---------------------------------------------------------------------------

  describe("options", () => {
    it("should name the type after the first contract", () => {
      const Named = defineProxy(app, [IntSupplier, Hello], { resolver: () => undefined });

      expect(Named.name).toBe("IntSupplier$$Proxy");
      expect(Named.type.name).toBe("IntSupplier$$Proxy");
    });

    it("should take an explicit name", () => {
      const Named = defineProxy(app, [IntSupplier], { resolver: () => undefined, name: "Answer" });

      expect(Named.name).toBe("Answer");
      expect(Named.newInstance().toString()).toMatch(/^Answer@/);
    });

    it("should retain the type with the lookup on request", () => {
      const host = lookup("host");
      const Retained = defineProxy(host, [IntSupplier], { resolver: () => undefined, registerWithHostLifetime: true });
      const Weak = defineProxy(host, [IntSupplier], { resolver: () => undefined });

      expect(host.retainedTypes()).toEqual([Retained.type]);
      expect(host.retainedTypes()).not.toContain(Weak.type);
    });
  });
});
