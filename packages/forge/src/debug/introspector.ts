import * as acorn from 'acorn';
import { log, logError } from '@toolsmith/common';
import type { FunctionSignature, ParameterSignature, TypeTag } from '../types';
import { extractErrorMessage } from '../utils';
import {
  DEFAULT_CALL_TIMEOUT_MS,
  isToolFunction,
  loadModule,
  type LoadedModule,
  type ToolFunction,
} from './sandbox';

export interface IntrospectionResult {
  module: LoadedModule | null;
  functions: FunctionSignature[];
}

interface JsDoc {
  params: Map<string, string>;
  returns?: string;
}

interface Declaration {
  params: acorn.Pattern[];
  /** Offset the preceding JSDoc block must end against. */
  start: number;
}

interface SourceIndex {
  declarations: Map<string, Declaration>;
  aliases: Map<string, string>;
  comments: acorn.Comment[];
  source: string;
}

type FunctionNode = acorn.FunctionExpression | acorn.ArrowFunctionExpression;

const PARAM_TAG = /@param\s+\{([^}]*)\}\s+\[?([\w$]+)/g;
const RETURNS_TAG = /@returns?\s+\{([^}]*)\}/;

const PARSE_OPTIONS: acorn.Options = {
  ecmaVersion: 'latest',
  sourceType: 'script',
  allowReturnOutsideFunction: true,
  allowHashBang: true,
};

export function mapDeclaredType(declared: string | undefined): TypeTag {
  if (!declared) return 'unknown';
  const text = declared.trim();
  const lower = text.toLowerCase();
  if (lower === 'string') return 'string';
  if (lower === 'int' || lower === 'integer') return 'integer';
  if (lower === 'number' || lower === 'float' || lower === 'double') return 'float';
  if (lower === 'boolean' || lower === 'bool') return 'boolean';
  if (lower === 'array' || /^array\s*<.*>$/i.test(text) || /\[\]$/.test(text)) return 'list';
  if (
    lower === 'object' ||
    lower === 'map' ||
    /^(record|map)\s*<.*>$/i.test(text) ||
    text.startsWith('{')
  ) {
    return 'mapping';
  }
  return 'unknown';
}

export function parseJsDoc(comment: string): JsDoc {
  const params = new Map<string, string>();
  for (const match of comment.matchAll(PARAM_TAG)) {
    params.set(match[2], match[1].trim());
  }
  const returns = comment.match(RETURNS_TAG)?.[1]?.trim();
  return { params, returns };
}

type LiteralResult = { ok: true; value: unknown } | { ok: false };

const NOT_LITERAL: LiteralResult = { ok: false };

/**
 * Evaluates literal default values: primitives, negated numbers, plain template strings, and
 * arrays or objects built only from those.
 */
export function literalValue(node: acorn.Expression): LiteralResult {
  switch (node.type) {
    case 'Literal':
      if ('regex' in node && node.regex) return NOT_LITERAL;
      if (typeof node.value === 'bigint') return NOT_LITERAL;
      return { ok: true, value: node.value };
    case 'Identifier':
      return node.name === 'undefined' ? { ok: true, value: undefined } : NOT_LITERAL;
    case 'UnaryExpression': {
      if (node.operator !== '-' && node.operator !== '+') return NOT_LITERAL;
      const inner = literalValue(node.argument);
      if (!inner.ok || typeof inner.value !== 'number') return NOT_LITERAL;
      return { ok: true, value: node.operator === '-' ? -inner.value : inner.value };
    }
    case 'TemplateLiteral':
      return node.expressions.length === 0
        ? { ok: true, value: node.quasis[0]?.value.cooked ?? '' }
        : NOT_LITERAL;
    case 'ArrayExpression': {
      const values: unknown[] = [];
      for (const element of node.elements) {
        if (!element || element.type === 'SpreadElement') return NOT_LITERAL;
        const item = literalValue(element);
        if (!item.ok) return NOT_LITERAL;
        values.push(item.value);
      }
      return { ok: true, value: values };
    }
    case 'ObjectExpression': {
      const record: Record<string, unknown> = {};
      for (const property of node.properties) {
        if (property.type !== 'Property' || property.computed || property.kind !== 'init') {
          return NOT_LITERAL;
        }
        const key = propertyKey(property);
        if (key === null || !isExpression(property.value)) return NOT_LITERAL;
        const item = literalValue(property.value);
        if (!item.ok) return NOT_LITERAL;
        record[key] = item.value;
      }
      return { ok: true, value: record };
    }
    default:
      return NOT_LITERAL;
  }
}

const PATTERN_TYPES = new Set([
  'ObjectPattern',
  'ArrayPattern',
  'RestElement',
  'AssignmentPattern',
]);

const isExpression = (node: acorn.Expression | acorn.Pattern): node is acorn.Expression =>
  !PATTERN_TYPES.has(node.type);

function propertyKey(property: acorn.Property): string | null {
  if (property.key.type === 'Identifier') return property.key.name;
  if (property.key.type === 'Literal' && (typeof property.key.value === 'string' || typeof property.key.value === 'number')) {
    return String(property.key.value);
  }
  return null;
}

const isFunctionNode = (node: acorn.Expression | acorn.Pattern | null | undefined): node is FunctionNode =>
  !!node && (node.type === 'FunctionExpression' || node.type === 'ArrowFunctionExpression');

/** `module.exports` */
const isModuleExports = (node: acorn.Pattern | acorn.Expression | acorn.Super): boolean =>
  node.type === 'MemberExpression' &&
  !node.computed &&
  node.object.type === 'Identifier' &&
  node.object.name === 'module' &&
  node.property.type === 'Identifier' &&
  node.property.name === 'exports';

/** Name assigned by `module.exports.name = ...` or `exports.name = ...`. */
function exportedMemberName(node: acorn.Pattern): string | null {
  if (node.type !== 'MemberExpression' || node.computed || node.property.type !== 'Identifier') {
    return null;
  }
  const target = node.object;
  if (isModuleExports(target) || (target.type === 'Identifier' && target.name === 'exports')) {
    return node.property.name;
  }
  return null;
}

function indexSource(source: string): SourceIndex | null {
  const comments: acorn.Comment[] = [];
  let program: acorn.Program;
  try {
    program = acorn.parse(source, { ...PARSE_OPTIONS, onComment: comments });
  } catch (error) {
    logError(`[Introspector] Could not parse module source: ${extractErrorMessage(error)}`);
    return null;
  }

  const declarations = new Map<string, Declaration>();
  const aliases = new Map<string, string>();
  const declare = (name: string, params: acorn.Pattern[], start: number) => {
    if (!declarations.has(name)) declarations.set(name, { params, start });
  };

  for (const statement of program.body) {
    if (statement.type === 'FunctionDeclaration') {
      declare(statement.id.name, statement.params, statement.start);
    } else if (statement.type === 'VariableDeclaration') {
      for (const declarator of statement.declarations) {
        if (declarator.id.type !== 'Identifier' || !isFunctionNode(declarator.init)) continue;
        const start = statement.declarations.length === 1 ? statement.start : declarator.start;
        declare(declarator.id.name, declarator.init.params, start);
      }
    } else if (
      statement.type === 'ExpressionStatement' &&
      statement.expression.type === 'AssignmentExpression' &&
      statement.expression.operator === '='
    ) {
      const { left, right } = statement.expression;
      const member = exportedMemberName(left);
      if (member !== null) {
        if (isFunctionNode(right)) declare(member, right.params, statement.start);
        else if (right.type === 'Identifier') aliases.set(member, right.name);
        continue;
      }
      if (!isModuleExports(left)) continue;
      if (isFunctionNode(right) && right.type === 'FunctionExpression' && right.id) {
        declare(right.id.name, right.params, statement.start);
      } else if (right.type === 'ObjectExpression') {
        for (const property of right.properties) {
          if (property.type !== 'Property' || property.computed) continue;
          const key = propertyKey(property);
          if (key === null) continue;
          if (isFunctionNode(property.value)) declare(key, property.value.params, property.start);
          else if (property.value.type === 'Identifier' && property.value.name !== key) {
            aliases.set(key, property.value.name);
          }
        }
      }
    }
  }

  return { declarations, aliases, comments, source };
}

function jsDocBefore(index: SourceIndex, start: number): JsDoc {
  let candidate: acorn.Comment | undefined;
  for (const comment of index.comments) {
    if (comment.end > start) break;
    candidate = comment;
  }
  if (
    candidate &&
    candidate.type === 'Block' &&
    candidate.value.startsWith('*') &&
    index.source.slice(candidate.end, start).trim() === ''
  ) {
    return parseJsDoc(candidate.value);
  }
  return { params: new Map() };
}

/**
 * Parameters recovered from the function's own text, for functions built in ways the source
 * index does not follow.
 */
function paramsFromFunctionText(fn: ToolFunction): acorn.Pattern[] | null {
  const text = Function.prototype.toString.call(fn);
  for (const wrapped of [`(${text})`, `({${text}})`]) {
    try {
      const expression = acorn.parseExpressionAt(wrapped, 0, PARSE_OPTIONS);
      if (isFunctionNode(expression)) return expression.params;
      if (expression.type === 'ObjectExpression') {
        const property = expression.properties[0];
        if (property?.type === 'Property' && isFunctionNode(property.value)) return property.value.params;
      }
    } catch {
      // try the next wrapping
    }
  }
  return null;
}

function describeParameters(params: acorn.Pattern[], jsDoc: JsDoc): ParameterSignature[] {
  return params.map((param, index): ParameterSignature => {
    let target: acorn.Pattern = param;
    let defaultNode: acorn.Expression | undefined;
    if (param.type === 'AssignmentPattern') {
      target = param.left;
      defaultNode = param.right;
    }

    if (target.type !== 'Identifier') {
      return {
        name: `arg${index}`,
        type: 'unknown',
        declaredType: 'any',
        hasDefault: defaultNode !== undefined,
      };
    }

    const declared = jsDoc.params.get(target.name);
    const signature: ParameterSignature = {
      name: target.name,
      type: mapDeclaredType(declared),
      declaredType: declared ?? 'any',
      hasDefault: defaultNode !== undefined,
    };
    if (defaultNode) {
      const literal = literalValue(defaultNode);
      if (literal.ok) signature.defaultValue = literal.value;
    }
    return signature;
  });
}

/**
 * Public functions of a module's exports, in export order: the export itself when it is a
 * function, otherwise every function-valued property whose name does not start with `_`.
 */
export function exportedFunctions(exported: unknown): Array<[string, ToolFunction]> {
  if (isToolFunction(exported)) {
    const name = exported.name || 'default';
    return name.startsWith('_') ? [] : [[name, exported]];
  }
  if (typeof exported !== 'object' || exported === null) return [];

  const functions: Array<[string, ToolFunction]> = [];
  for (const key of Object.keys(exported)) {
    const value: unknown = Reflect.get(exported, key);
    if (!key.startsWith('_') && isToolFunction(value)) functions.push([key, value]);
  }
  return functions;
}

function findDeclaration(index: SourceIndex, name: string, fn: ToolFunction): Declaration | undefined {
  const alias = index.aliases.get(name);
  return (
    index.declarations.get(name) ??
    (alias ? index.declarations.get(alias) : undefined) ??
    (fn.name ? index.declarations.get(fn.name) : undefined)
  );
}

function describeFunction(
  name: string,
  fn: ToolFunction,
  index: SourceIndex | null
): FunctionSignature {
  const declaration = index ? findDeclaration(index, name, fn) : undefined;
  if (declaration && index) {
    const jsDoc = jsDocBefore(index, declaration.start);
    return {
      name,
      parameters: describeParameters(declaration.params, jsDoc),
      returnType: mapDeclaredType(jsDoc.returns),
    };
  }

  const params = paramsFromFunctionText(fn);
  if (params) {
    return { name, parameters: describeParameters(params, { params: new Map() }), returnType: 'unknown' };
  }

  return {
    name,
    parameters: Array.from({ length: fn.length }, (_, i): ParameterSignature => ({
      name: `arg${i}`,
      type: 'unknown',
      declaredType: 'any',
      hasDefault: false,
    })),
    returnType: 'unknown',
  };
}

/**
 * Loads a module in a fresh context and derives the signature of every public exported function.
 * Load failures are logged and reported as an empty result.
 */
export async function introspectModule(
  modulePath: string,
  timeoutMs: number = DEFAULT_CALL_TIMEOUT_MS
): Promise<IntrospectionResult> {
  let loaded: LoadedModule;
  try {
    loaded = await loadModule(modulePath, timeoutMs);
  } catch (error) {
    logError(`[Introspector] ${extractErrorMessage(error)}`);
    return { module: null, functions: [] };
  }

  const index = indexSource(loaded.source);
  const functions = exportedFunctions(loaded.exports).map(([name, fn]) =>
    describeFunction(name, fn, index)
  );
  log(`[Introspector] ${modulePath}: ${functions.map((fn) => fn.name).join(', ') || 'no public functions'}`);
  return { module: loaded, functions };
}
