/**
 * Source-emitting backend (the default).
 *
 * The proxy class is built as a TypeScript AST, printed, and evaluated with
 * `node:vm`. For a delegating `IntSupplier` proxy the evaluated source reads:
 *
 * ```js
 * (function ($base, $sites, $enter) {
 *     class IntSupplier$$Proxy extends $base {
 *         #delegate;
 *         constructor(delegate) {
 *             $enter(arguments.length, delegate);
 *             super();
 *             this.#delegate = delegate;
 *         }
 *         getAsInt() {
 *             const target = $sites[0].target;
 *             return target(this, this.#delegate);
 *         }
 *     }
 *     return IntSupplier$$Proxy;
 * })
 * ```
 */

import * as ts from "typescript";
import * as vm from "node:vm";
import { ArgumentError, createLogger, invariant } from "@lazyproxy/core";
import type { AnalyzedMethod } from "../analyzer.js";
import { ProxyBase, isProxyClass } from "../proxy-base.js";
import { checkArity, installDefaults } from "./shared.js";
import type { EmitRequest, LoadableType, TypeSynthesisBackend } from "./types.js";

const log = createLogger("emit");
const f = ts.factory;
const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
const dummySource = ts.createSourceFile("__proxy__.js", "", ts.ScriptTarget.ES2022, false, ts.ScriptKind.JS);

const BASE = "$base";
const SITES = "$sites";
const ENTER = "$enter";
const DELEGATE = "#delegate";

function delegateField(): ts.Expression {
  return f.createPropertyAccessExpression(f.createThis(), f.createPrivateIdentifier(DELEGATE));
}

function call(callee: ts.Expression, args: readonly ts.Expression[]): ts.CallExpression {
  return f.createCallExpression(callee, undefined, args);
}

function createConstructor(hasDelegate: boolean): ts.ConstructorDeclaration {
  const parameters = hasDelegate ? [f.createParameterDeclaration(undefined, undefined, "delegate")] : [];
  const statements: ts.Statement[] = [
    f.createExpressionStatement(
      call(f.createIdentifier(ENTER), [
        f.createPropertyAccessExpression(f.createIdentifier("arguments"), "length"),
        hasDelegate ? f.createIdentifier("delegate") : f.createVoidZero(),
      ])
    ),
    f.createExpressionStatement(call(f.createSuper(), [])),
  ];
  if (hasDelegate) {
    statements.push(
      f.createExpressionStatement(f.createAssignment(delegateField(), f.createIdentifier("delegate")))
    );
  }
  return f.createConstructorDeclaration(undefined, parameters, f.createBlock(statements, true));
}

/**
 * `name(a0, a1) { const target = $sites[n].target; return target(this, [delegate], a0, a1); }`
 */
function createTrampoline(method: AnalyzedMethod, hasDelegate: boolean): ts.MethodDeclaration {
  const { info, ordinal } = method;
  const count = info.parameterTypes.length;
  const names = Array.from({ length: count }, (_, i) => `a${i}`);

  const parameters = names.map((name, i) =>
    f.createParameterDeclaration(
      undefined,
      info.isVarargs && i === count - 1 ? f.createToken(ts.SyntaxKind.DotDotDotToken) : undefined,
      name
    )
  );

  const target = f.createVariableStatement(
    undefined,
    f.createVariableDeclarationList(
      [
        f.createVariableDeclaration(
          "target",
          undefined,
          undefined,
          f.createPropertyAccessExpression(
            f.createElementAccessExpression(f.createIdentifier(SITES), f.createNumericLiteral(ordinal)),
            "target"
          )
        ),
      ],
      ts.NodeFlags.Const
    )
  );

  const args: ts.Expression[] = [
    f.createThis(),
    ...(hasDelegate ? [delegateField()] : []),
    ...names.map((name) => f.createIdentifier(name)),
  ];

  return f.createMethodDeclaration(
    undefined,
    undefined,
    info.name,
    undefined,
    undefined,
    parameters,
    undefined,
    f.createBlock([target, f.createReturnStatement(call(f.createIdentifier("target"), args))], true)
  );
}

/**
 * Print the factory expression that creates the proxy class.
 */
export function generateSource(request: EmitRequest): string {
  const hasDelegate = request.delegateType !== undefined;
  const members: ts.ClassElement[] = [];
  if (hasDelegate) {
    members.push(f.createPropertyDeclaration(undefined, f.createPrivateIdentifier(DELEGATE), undefined, undefined, undefined));
  }
  members.push(createConstructor(hasDelegate));
  for (const method of request.descriptor.methods) {
    members.push(createTrampoline(method, hasDelegate));
  }

  const classDeclaration = f.createClassDeclaration(
    undefined,
    request.typeName,
    undefined,
    [
      f.createHeritageClause(ts.SyntaxKind.ExtendsKeyword, [
        f.createExpressionWithTypeArguments(f.createIdentifier(BASE), undefined),
      ]),
    ],
    members
  );

  const factory = f.createParenthesizedExpression(
    f.createFunctionExpression(
      undefined,
      undefined,
      undefined,
      undefined,
      [BASE, SITES, ENTER].map((name) => f.createParameterDeclaration(undefined, undefined, name)),
      undefined,
      f.createBlock([classDeclaration, f.createReturnStatement(f.createIdentifier(request.typeName))], true)
    )
  );

  return printer.printNode(ts.EmitHint.Expression, factory, dummySource);
}

export const emitBackend: TypeSynthesisBackend = {
  name: "emit",

  emit(request: EmitRequest): LoadableType {
    if ([BASE, SITES, ENTER].includes(request.typeName)) {
      throw new ArgumentError(`'${request.typeName}' cannot be used as a proxy type name`);
    }
    checkArity(request);

    const source = generateSource(request);
    log.debug(`${request.typeName}:\n${source}`);

    const factory: unknown = vm.runInThisContext(source, { filename: `lazyproxy/${request.typeName}.js` });
    invariant(typeof factory === "function", `source of ${request.typeName} did not evaluate to a function`);
    const type: unknown = Reflect.apply(factory, undefined, [ProxyBase, request.sites, request.enter]);
    invariant(isProxyClass(type), `source of ${request.typeName} did not produce a proxy class`);

    installDefaults(type.prototype, request.descriptor.inheritedDefaults);
    return { type, source };
  },
};
