import type { RawExpr } from "../../syntax/ast";

export interface VerdictRef {
  id: string;
  line: number;
}

/** Every `verdict_present` in `e`, left to right. */
export function verdictRefs(e: RawExpr): VerdictRef[] {
  switch (e.tag) {
    case "VerdictPresent":
      return [{ id: e.id, line: e.line }];
    case "And":
    case "Or":
    case "Compare":
    case "Arith":
      return [...verdictRefs(e.left), ...verdictRefs(e.right)];
    case "Not":
      return verdictRefs(e.operand);
    case "Quantifier":
      return verdictRefs(e.body);
    default:
      return [];
  }
}
