import type { Type } from "../types/types";
import { formatType } from "../types/format";
import type { TypeReq } from "../types/requirement";
import type { Value } from "../value";
import type { SourceLocation, CheckResult } from "../errors";
import { type CheckConfig, type CheckLogger, resolveConfig } from "./config";
import type { Typed } from "./check-type";
import { checkValue } from "./check-value";

/**
 * A check the static phase could not decide, kept until the value exists.
 *
 * The typechecker places one of these in the checked program wherever
 * `checkType` deferred; the evaluator runs it on the value it produces.
 */
export class RuntimeCheck {
  private readonly logger: CheckLogger;

  constructor(
    public readonly requirement: TypeReq,
    public readonly at: SourceLocation,
    // The type the value has once the check passes.
    public readonly type: Type,
    config: CheckConfig = {}
  ) {
    this.logger = resolveConfig(config).logger;
  }

  /**
   * The runtime check a static outcome calls for, if any.
   */
  static forTyped(
    requirement: TypeReq,
    at: SourceLocation,
    typed: Typed,
    config: CheckConfig = {}
  ): RuntimeCheck | undefined {
    switch (typed.kind) {
      case "type":
        return undefined;
      case "defer":
        return new RuntimeCheck(requirement, at, typed.type, config);
    }
  }

  run(value: Value): CheckResult<Value> {
    this.logger.debug(
      `runtime check against ${formatType(this.type)} at ${this.at.from}..${this.at.to}`
    );
    return checkValue(this.requirement, this.at, value);
  }
}
