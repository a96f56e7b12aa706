/**
 * Whitelisted arithmetic for metric derivation formulas, e.g.
 * "(total_expenditure - total_revenue) / total_revenue * 100".
 * Accepts numbers, identifiers, + - * / and parentheses; anything else is rejected
 * at tokenization. Formulas are parsed to an AST and evaluated against a variable map.
 */

export type FormulaErrorReason = "malformed" | "missing_variable" | "division_by_zero" | "non_finite";

export class FormulaEvaluationError extends Error {
  readonly formula: string;
  readonly reason: FormulaErrorReason;

  constructor(formula: string, reason: FormulaErrorReason, detail: string) {
    super(`${reason}: ${detail} (formula: ${formula})`);
    this.name = "FormulaEvaluationError";
    this.formula = formula;
    this.reason = reason;
  }
}

export type BinaryOperator = "+" | "-" | "*" | "/";

export type FormulaNode =
  | { kind: "number"; value: number }
  | { kind: "variable"; name: string }
  | { kind: "negate"; operand: FormulaNode }
  | { kind: "binary"; op: BinaryOperator; left: FormulaNode; right: FormulaNode };

type Token =
  | { type: "number"; value: number }
  | { type: "identifier"; name: string }
  | { type: "operator"; op: BinaryOperator }
  | { type: "paren"; open: boolean };

/** Variable values; null/undefined count as missing. */
export type FormulaContext = Readonly<Record<string, number | null | undefined>>;

const NUMBER_RE = /^(\d+(\.\d*)?|\.\d+)/;
const IDENTIFIER_RE = /^[A-Za-z_][A-Za-z0-9_]*/;

function tokenize(formula: string): Token[] {
  const tokens: Token[] = [];
  let rest = formula;
  while (rest.length > 0) {
    const ch = rest[0];
    if (/\s/.test(ch)) {
      rest = rest.slice(1);
      continue;
    }
    if (ch === "+" || ch === "-" || ch === "*" || ch === "/") {
      tokens.push({ type: "operator", op: ch });
      rest = rest.slice(1);
      continue;
    }
    if (ch === "(" || ch === ")") {
      tokens.push({ type: "paren", open: ch === "(" });
      rest = rest.slice(1);
      continue;
    }
    const num = NUMBER_RE.exec(rest);
    if (num) {
      tokens.push({ type: "number", value: Number(num[0]) });
      rest = rest.slice(num[0].length);
      continue;
    }
    const ident = IDENTIFIER_RE.exec(rest);
    if (ident) {
      tokens.push({ type: "identifier", name: ident[0] });
      rest = rest.slice(ident[0].length);
      continue;
    }
    throw new FormulaEvaluationError(formula, "malformed", `unexpected character "${ch}"`);
  }
  return tokens;
}

/**
 * Recursive descent:
 *   expr   := term (("+" | "-") term)*
 *   term   := factor (("*" | "/") factor)*
 *   factor := ("-" | "+") factor | number | identifier | "(" expr ")"
 */
export function parseFormula(formula: string): FormulaNode {
  const tokens = tokenize(formula);
  let pos = 0;

  const fail = (detail: string): never => {
    throw new FormulaEvaluationError(formula, "malformed", detail);
  };

  function parseExpr(): FormulaNode {
    let node = parseTerm();
    for (;;) {
      const t = tokens[pos];
      if (t?.type !== "operator" || (t.op !== "+" && t.op !== "-")) return node;
      pos += 1;
      node = { kind: "binary", op: t.op, left: node, right: parseTerm() };
    }
  }

  function parseTerm(): FormulaNode {
    let node = parseFactor();
    for (;;) {
      const t = tokens[pos];
      if (t?.type !== "operator" || (t.op !== "*" && t.op !== "/")) return node;
      pos += 1;
      node = { kind: "binary", op: t.op, left: node, right: parseFactor() };
    }
  }

  function parseFactor(): FormulaNode {
    const t = tokens[pos];
    if (t == null) return fail("unexpected end of formula");
    pos += 1;
    switch (t.type) {
      case "number":
        return { kind: "number", value: t.value };
      case "identifier":
        return { kind: "variable", name: t.name };
      case "operator":
        if (t.op === "-") return { kind: "negate", operand: parseFactor() };
        if (t.op === "+") return parseFactor();
        return fail(`unexpected operator "${t.op}"`);
      case "paren": {
        if (!t.open) return fail('unexpected ")"');
        const inner = parseExpr();
        const close = tokens[pos];
        if (close?.type !== "paren" || close.open) return fail('missing ")"');
        pos += 1;
        return inner;
      }
    }
  }

  if (tokens.length === 0) return fail("empty formula");
  const ast = parseExpr();
  if (pos < tokens.length) fail("trailing tokens");
  return ast;
}

/** Variable names referenced by a formula, in first-use order. */
export function formulaVariables(formula: string): string[] {
  const names: string[] = [];
  const visit = (node: FormulaNode) => {
    switch (node.kind) {
      case "variable":
        if (!names.includes(node.name)) names.push(node.name);
        return;
      case "negate":
        visit(node.operand);
        return;
      case "binary":
        visit(node.left);
        visit(node.right);
        return;
      case "number":
        return;
    }
  };
  visit(parseFormula(formula));
  return names;
}

export function evaluateFormula(formula: string, context: FormulaContext): number {
  const ast = parseFormula(formula);

  const evaluate = (node: FormulaNode): number => {
    switch (node.kind) {
      case "number":
        return node.value;
      case "variable": {
        const v = Object.prototype.hasOwnProperty.call(context, node.name) ? context[node.name] : undefined;
        if (v == null || Number.isNaN(v)) {
          throw new FormulaEvaluationError(formula, "missing_variable", `no value for "${node.name}"`);
        }
        return v;
      }
      case "negate":
        return -evaluate(node.operand);
      case "binary": {
        const left = evaluate(node.left);
        const right = evaluate(node.right);
        switch (node.op) {
          case "+":
            return left + right;
          case "-":
            return left - right;
          case "*":
            return left * right;
          case "/":
            if (right === 0) {
              throw new FormulaEvaluationError(formula, "division_by_zero", "denominator evaluated to 0");
            }
            return left / right;
        }
      }
    }
  };

  const result = evaluate(ast);
  if (!Number.isFinite(result)) {
    throw new FormulaEvaluationError(formula, "non_finite", `result ${result}`);
  }
  return result;
}
