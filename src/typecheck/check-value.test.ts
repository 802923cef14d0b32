import { describe, it, expect } from "vitest";
import {
  ReqInt,
  ReqStr,
  listReq,
  setReq,
  dictReq,
  functionReq,
  noReq,
  conditionReq,
  annotationReq,
  type ReqType,
} from "../types/requirement";
import {
  type Value,
  nullVal,
  boolVal,
  intVal,
  stringVal,
  listVal,
  setVal,
  dictVal,
  functionVal,
} from "../value";
import { loc, formatPath, TypeCheckError, type CheckResult } from "../errors";
import { checkValue } from "./check-value";

const at = loc(3, 8);
const ann = (t: ReqType) => annotationReq(loc(0, 2), t);

function expectError(result: CheckResult<Value>): TypeCheckError {
  if (result.success) throw new Error("expected the check to fail");
  return result.error;
}

describe("checkValue", () => {
  it("passes values that fit", () => {
    const value = dictVal([[stringVal("a"), listVal([intVal(1), intVal(2)])]]);
    expect(checkValue(ann(dictReq(ReqStr, listReq(ReqInt))), at, value)).toEqual({
      success: true,
      value,
    });
  });

  it("passes anything without a requirement", () => {
    expect(checkValue(noReq, at, nullVal).success).toBe(true);
  });

  it("passes empty collections", () => {
    expect(checkValue(ann(listReq(ReqInt)), at, listVal([])).success).toBe(true);
    expect(checkValue(ann(dictReq(ReqStr, ReqInt)), at, dictVal([])).success).toBe(true);
  });

  it("reports an atom mismatch with both sides", () => {
    const error = expectError(checkValue(conditionReq, at, intVal(1)));
    expect(error.message).toBe("Type mismatch.");
    expect(error.loc).toEqual(at);
    expect(error.body).toBe(
      "Expected a value that fits this type:\n\n  Bool\n\nBut got this value:\n\n  1"
    );
    expect(error.path).toEqual([]);
  });

  it("reports the index of a list element", () => {
    const value = listVal([intVal(1), intVal(2), stringVal("x")]);
    const error = expectError(checkValue(ann(listReq(ReqInt)), at, value));
    expect(error.path[0]).toEqual({ kind: "index", index: 2 });
    expect(error.body).toBe(
      'Expected a value that fits this type:\n\n  Int\n\nBut got this value:\n\n  "x"'
    );
  });

  it("reports the position of a set element", () => {
    const value = setVal([intVal(1), stringVal("no")]);
    const error = expectError(checkValue(ann(setReq(ReqInt)), at, value));
    expect(error.path).toEqual([{ kind: "index", index: 1 }]);
  });

  it("reports the key of a dict entry with a bad value", () => {
    const value = dictVal([[stringVal("a"), boolVal(true)]]);
    const error = expectError(checkValue(ann(dictReq(ReqStr, ReqInt)), at, value));
    expect(error.path).toEqual([{ kind: "key", key: stringVal("a") }]);
    expect(formatPath(error.path)).toBe('["a"]');
  });

  it("reports the key of a dict entry with a bad key", () => {
    const value = dictVal([[stringVal("k"), intVal(1)]]);
    const error = expectError(checkValue(ann(dictReq(ReqInt, ReqInt)), at, value));
    expect(error.path).toEqual([{ kind: "key", key: stringVal("k") }]);
  });

  it("builds the path from the outside in", () => {
    const value = listVal([
      dictVal([[stringVal("a"), listVal([intVal(1)])]]),
      dictVal([[stringVal("b"), listVal([intVal(1), nullVal])]]),
    ]);
    const req = ann(listReq(dictReq(ReqStr, listReq(ReqInt))));
    const error = expectError(checkValue(req, at, value));
    expect(formatPath(error.path)).toBe('[1]["b"][1]');
  });

  it("rejects a compound value of the wrong kind", () => {
    const error = expectError(
      checkValue(ann(listReq(ReqInt)), at, dictVal([[intVal(1), intVal(2)]]))
    );
    expect(error.body).toBe(
      "Expected a value that fits this type:\n\n  List[Int]\n\nBut got this value:\n\n  {1: 2}"
    );
    expect(error.path).toEqual([]);
  });

  describe("functions", () => {
    const req = ann(functionReq([ReqInt], ReqInt));

    it("rejects function values, whose signature is unknown at runtime", () => {
      const error = expectError(checkValue(req, at, functionVal("double")));
      expect(error.message).toBe("Type mismatch.");
      expect(error.body).toBe(
        "Expected a value that fits this type:\n\n  (Int) -> Int\n\nBut got this value:\n\n  <function double>"
      );
    });

    it("rejects other values", () => {
      const error = expectError(checkValue(req, at, intVal(1)));
      expect(error.body).toBe(
        "Expected a value that fits this type:\n\n  (Int) -> Int\n\nBut got this value:\n\n  1"
      );
    });

    it("rejects functions where data is required", () => {
      expect(checkValue(ann(ReqInt), at, functionVal("double")).success).toBe(false);
    });
  });
});
