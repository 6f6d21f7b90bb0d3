import ts from 'typescript';

import type {
  Message,
  Piece,
  SubMessageClause,
  SubMessagePiece,
  SubMessageSelector,
} from '../../types/messages';

const INTL_METHODS = ['message', 'plural', 'gender', 'select'] as const;
type IntlMethod = (typeof INTL_METHODS)[number];

const CLAUSE_KEYS: Record<'plural' | 'gender', string[]> = {
  plural: ['zero', 'one', 'two', 'few', 'many', 'other'],
  gender: ['female', 'male', 'other'],
};

export type ScanContext = {
  sourceFile: ts.SourceFile;
  transformer: boolean;
  allowEmbeddedPluralsAndGenders: boolean;
  descriptionRequired: boolean;
  warn: (node: ts.Node, message: string) => void;
};

type IntlCall = {
  call: ts.CallExpression;
  method: IntlMethod;
};

type CallOptions = {
  name?: string;
  args?: string[];
  desc?: string;
  meaning?: string;
  examples?: Record<string, string[]>;
  clauses: Array<{ key: string; value: ts.Expression }>;
};

type EnclosingFunction = {
  name?: string;
  params: string[];
};

function isIntlMethod(value: string): value is IntlMethod {
  return INTL_METHODS.some(method => method === value);
}

function asIntlCall(node: ts.Node): IntlCall | null {
  if (!ts.isCallExpression(node)) {
    return null;
  }
  const callee = node.expression;
  if (
    ts.isPropertyAccessExpression(callee) &&
    ts.isIdentifier(callee.expression) &&
    callee.expression.text === 'Intl' &&
    isIntlMethod(callee.name.text)
  ) {
    return { call: node, method: callee.name.text };
  }
  return null;
}

function propertyName(name: ts.PropertyName): string | null {
  if (
    ts.isIdentifier(name) ||
    ts.isStringLiteral(name) ||
    ts.isNumericLiteral(name)
  ) {
    return name.text;
  }
  return null;
}

function stringValue(expr: ts.Expression): string | null {
  if (ts.isStringLiteral(expr) || ts.isNoSubstitutionTemplateLiteral(expr)) {
    return expr.text;
  }
  return null;
}

function exampleValue(expr: ts.Expression): string | null {
  if (ts.isNumericLiteral(expr)) {
    return expr.text;
  }
  if (
    expr.kind === ts.SyntaxKind.TrueKeyword ||
    expr.kind === ts.SyntaxKind.FalseKeyword
  ) {
    return expr.getText();
  }
  return stringValue(expr);
}

function readArgs(expr: ts.Expression, ctx: ScanContext): string[] | null {
  if (!ts.isArrayLiteralExpression(expr)) {
    ctx.warn(expr, "The 'args' option must be an array literal");
    return null;
  }
  const args: string[] = [];
  for (const element of expr.elements) {
    if (!ts.isIdentifier(element)) {
      ctx.warn(element, "The 'args' option may only list identifiers");
      return null;
    }
    args.push(element.text);
  }
  return args;
}

function readExamples(
  expr: ts.Expression,
  ctx: ScanContext,
): Record<string, string[]> | null {
  if (!ts.isObjectLiteralExpression(expr)) {
    ctx.warn(expr, "The 'examples' option must be an object literal");
    return null;
  }
  const examples: Record<string, string[]> = {};
  for (const property of expr.properties) {
    const key = ts.isPropertyAssignment(property)
      ? propertyName(property.name)
      : null;
    if (!ts.isPropertyAssignment(property) || key == null) {
      ctx.warn(property, 'Examples must be plain properties');
      return null;
    }

    const value = property.initializer;
    const values = ts.isArrayLiteralExpression(value)
      ? value.elements.map(exampleValue)
      : [exampleValue(value)];
    const literals = values.filter((entry): entry is string => entry != null);
    if (literals.length !== values.length) {
      ctx.warn(value, `Examples for '${key}' must be literals`);
      return null;
    }
    examples[key] = literals;
  }
  return examples;
}

function readOptions(
  expr: ts.Expression | undefined,
  ctx: ScanContext,
): CallOptions | null {
  const options: CallOptions = { clauses: [] };
  if (expr === undefined) {
    return options;
  }
  if (!ts.isObjectLiteralExpression(expr)) {
    ctx.warn(expr, 'Intl options must be an object literal');
    return null;
  }

  for (const property of expr.properties) {
    const key = ts.isPropertyAssignment(property)
      ? propertyName(property.name)
      : null;
    if (!ts.isPropertyAssignment(property) || key == null) {
      ctx.warn(property, 'Intl options must be plain properties');
      return null;
    }

    const value = property.initializer;
    switch (key) {
      case 'name':
      case 'desc':
      case 'meaning':
      case 'locale': {
        const text = stringValue(value);
        if (text == null) {
          ctx.warn(value, `The '${key}' option must be a string literal`);
          return null;
        }
        if (key === 'name') {
          options.name = text;
        } else if (key === 'desc') {
          options.desc = text;
        } else if (key === 'meaning') {
          options.meaning = text;
        }
        break;
      }
      case 'args': {
        const args = readArgs(value, ctx);
        if (args == null) {
          return null;
        }
        options.args = args;
        break;
      }
      case 'examples': {
        const examples = readExamples(value, ctx);
        if (examples == null) {
          return null;
        }
        options.examples = examples;
        break;
      }
      case 'skip':
        break;
      default:
        options.clauses.push({ key, value });
    }
  }
  return options;
}

function readCases(
  expr: ts.Expression | undefined,
  call: ts.CallExpression,
  ctx: ScanContext,
): CallOptions['clauses'] | null {
  if (expr === undefined || !ts.isObjectLiteralExpression(expr)) {
    ctx.warn(expr ?? call, 'Intl.select cases must be an object literal');
    return null;
  }
  const clauses: CallOptions['clauses'] = [];
  for (const property of expr.properties) {
    const key = ts.isPropertyAssignment(property)
      ? propertyName(property.name)
      : null;
    if (!ts.isPropertyAssignment(property) || key == null) {
      ctx.warn(property, 'Intl.select cases must be plain properties');
      return null;
    }
    clauses.push({ key, value: property.initializer });
  }
  return clauses;
}

function mergeLiterals(pieces: Piece[]): Piece[] {
  const merged: Piece[] = [];
  for (const piece of pieces) {
    const last = merged[merged.length - 1];
    if (piece.type === 'literal' && last?.type === 'literal') {
      merged[merged.length - 1] = {
        type: 'literal',
        value: last.value + piece.value,
      };
    } else if (piece.type !== 'literal' || piece.value !== '') {
      merged.push(piece);
    }
  }
  return merged;
}

function readInterpolation(
  expr: ts.Expression,
  args: string[],
  ctx: ScanContext,
): Piece | null {
  if (ts.isIdentifier(expr)) {
    const index = args.indexOf(expr.text);
    if (index === -1) {
      ctx.warn(expr, `Interpolated identifier '${expr.text}' is not in args`);
      return null;
    }
    return { type: 'placeholder', index };
  }

  const nested = asIntlCall(expr);
  if (nested && nested.method !== 'message') {
    if (!ctx.allowEmbeddedPluralsAndGenders) {
      ctx.warn(
        expr,
        'Plurals and genders must be at the top level of a message',
      );
      return null;
    }
    return readSubMessage(nested, args, ctx)?.piece ?? null;
  }

  ctx.warn(expr, 'Only simple identifiers may be interpolated in messages');
  return null;
}

function readPieces(
  expr: ts.Expression,
  args: string[],
  ctx: ScanContext,
): Piece[] | null {
  const text = stringValue(expr);
  if (text != null) {
    return mergeLiterals([{ type: 'literal', value: text }]);
  }
  if (ts.isParenthesizedExpression(expr)) {
    return readPieces(expr.expression, args, ctx);
  }
  if (
    ts.isBinaryExpression(expr) &&
    expr.operatorToken.kind === ts.SyntaxKind.PlusToken
  ) {
    const left = readPieces(expr.left, args, ctx);
    const right = left && readPieces(expr.right, args, ctx);
    return left && right ? mergeLiterals([...left, ...right]) : null;
  }
  if (ts.isTemplateExpression(expr)) {
    const pieces: Piece[] = [{ type: 'literal', value: expr.head.text }];
    for (const span of expr.templateSpans) {
      const piece = readInterpolation(span.expression, args, ctx);
      if (piece == null) {
        return null;
      }
      pieces.push(piece, { type: 'literal', value: span.literal.text });
    }
    return mergeLiterals(pieces);
  }

  ctx.warn(
    expr,
    'Intl message text must be a string literal or a template literal',
  );
  return null;
}

function readSubMessage(
  { call, method }: IntlCall,
  args: string[],
  ctx: ScanContext,
  options?: CallOptions,
): { piece: SubMessagePiece } | null {
  const selector: SubMessageSelector =
    method === 'plural' ? 'plural' : method === 'gender' ? 'gender' : 'select';
  const main = call.arguments[0];
  if (main === undefined || !ts.isIdentifier(main)) {
    ctx.warn(main ?? call, `Intl.${method} needs an identifier to select on`);
    return null;
  }
  if (!args.includes(main.text)) {
    ctx.warn(main, `Selector '${main.text}' is not in args`);
    return null;
  }

  const clauseSources =
    selector === 'select'
      ? readCases(call.arguments[1], call, ctx)
      : (options ?? readOptions(call.arguments[1], ctx))?.clauses;
  if (clauseSources == null) {
    return null;
  }

  const clauses: SubMessageClause[] = [];
  for (const { key, value } of clauseSources) {
    if (selector !== 'select' && !CLAUSE_KEYS[selector].includes(key)) {
      ctx.warn(value, `Unknown ${selector} clause '${key}'`);
      return null;
    }
    const pieces = readPieces(value, args, ctx);
    if (pieces == null) {
      return null;
    }
    clauses.push({ key, pieces });
  }

  if (!clauses.some(clause => clause.key === 'other')) {
    ctx.warn(call, `Intl.${method} must have an 'other' clause`);
    return null;
  }

  return {
    piece: { type: 'sub-message', selector, argument: main.text, clauses },
  };
}

function className(node: ts.Node): string | undefined {
  const parent = node.parent;
  if (
    (ts.isClassDeclaration(parent) || ts.isClassExpression(parent)) &&
    parent.name
  ) {
    return parent.name.text;
  }
  return undefined;
}

function enclosingFunction(node: ts.Node): EnclosingFunction | null {
  for (let current = node.parent; current; current = current.parent) {
    if (!ts.isFunctionLike(current)) {
      continue;
    }

    const params = current.parameters.flatMap(param =>
      ts.isIdentifier(param.name) ? [param.name.text] : [],
    );

    if (
      (ts.isMethodDeclaration(current) || ts.isGetAccessor(current)) &&
      current.name
    ) {
      const method = propertyName(current.name);
      const owner = className(current);
      const name =
        method == null ? undefined : owner ? `${owner}_${method}` : method;
      return { name, params };
    }
    if (ts.isFunctionDeclaration(current) && current.name) {
      return { name: current.name.text, params };
    }
    if (ts.isArrowFunction(current) || ts.isFunctionExpression(current)) {
      const holder = current.parent;
      if (ts.isVariableDeclaration(holder) && ts.isIdentifier(holder.name)) {
        return { name: holder.name.text, params };
      }
      if (ts.isPropertyAssignment(holder)) {
        return { name: propertyName(holder.name) ?? undefined, params };
      }
    }
    return { params };
  }
  return null;
}

function plainText(pieces: Piece[]): string {
  return pieces
    .map(piece => (piece.type === 'literal' ? piece.value : ''))
    .join('');
}

function readMessage(intlCall: IntlCall, ctx: ScanContext): Message | null {
  const { call, method } = intlCall;
  const options =
    method === 'select'
      ? readOptions(call.arguments[2], ctx)
      : readOptions(call.arguments[1], ctx);
  if (options == null) {
    return null;
  }
  if (method !== 'plural' && method !== 'gender') {
    const unknown = options.clauses[0];
    if (unknown) {
      ctx.warn(unknown.value, `Unknown Intl.${method} option '${unknown.key}'`);
      return null;
    }
  }

  const enclosing = enclosingFunction(call);
  const args =
    options.args ?? (ctx.transformer ? (enclosing?.params ?? []) : []);

  let pieces: Piece[] | null;
  if (method === 'message') {
    const text = call.arguments[0];
    if (text === undefined) {
      ctx.warn(call, 'Intl.message needs the message text');
      return null;
    }
    pieces = readPieces(text, args, ctx);
  } else {
    const sub = readSubMessage(intlCall, args, ctx, options);
    pieces = sub && [sub.piece];
  }
  if (pieces == null) {
    return null;
  }

  let id = options.name;
  if (id === undefined && ctx.transformer) {
    id = enclosing?.name;
  }
  if (id === undefined && method === 'message' && args.length === 0) {
    id = plainText(pieces);
  }
  if (!id) {
    ctx.warn(call, `The 'name' option must be supplied for Intl.${method}`);
    return null;
  }

  if (ctx.descriptionRequired && !options.desc) {
    ctx.warn(call, `Missing description for message '${id}'`);
    return null;
  }

  const { line } = ctx.sourceFile.getLineAndCharacterOfPosition(
    call.getStart(ctx.sourceFile),
  );

  const message: Message = {
    id,
    pieces,
    arguments: args,
    location: { file: ctx.sourceFile.fileName, line: line + 1 },
  };
  if (options.desc !== undefined) {
    message.description = options.desc;
  }
  if (options.examples !== undefined) {
    message.examples = options.examples;
  }
  if (options.meaning !== undefined) {
    message.meaning = options.meaning;
  }
  return message;
}

/**
 * Collect every top-level `Intl.message`, `Intl.plural`, `Intl.gender` and
 * `Intl.select` call of a source file. Calls embedded in a message template
 * become sub-messages of that message.
 */
export function findMessages(ctx: ScanContext): Message[] {
  const messages: Message[] = [];
  const visit = (node: ts.Node) => {
    const intlCall = asIntlCall(node);
    if (intlCall) {
      const message = readMessage(intlCall, ctx);
      if (message) {
        messages.push(message);
      }
      return;
    }
    ts.forEachChild(node, visit);
  };
  visit(ctx.sourceFile);
  return messages;
}
