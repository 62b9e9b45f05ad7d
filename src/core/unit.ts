import { abstractUnit, registerAbstraction } from "./abstract-value";
import { registerLiteralable } from "../ir/literal";

/** The value of equations with no meaningful output. */
export class Unit {
  toString(): string {
    return "*";
  }
}

export const unit = new Unit();

/** Implicit variable every environment binds to `unit`. */
export class UnitVar {
  toString(): string {
    return "*";
  }
}

export const unitVar = new UnitVar();

registerAbstraction(Unit, () => abstractUnit);
registerLiteralable(Unit, () => ["*", "unit"]);
