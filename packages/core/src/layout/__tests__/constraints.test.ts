import { assert, describe, test } from "@foldbar/testkit";
import {
  UNBOUNDED,
  constrainConstraints,
  constrainSize,
  constraints,
  isBounded,
  looseConstraints,
  relaxHeight,
  tightConstraints,
  validateConstraints,
} from "../constraints.js";

describe("constraints", () => {
  test("tight and loose helpers set both bounds", () => {
    assert.deepEqual(tightConstraints(30, 4), { minW: 30, maxW: 30, minH: 4, maxH: 4 });
    assert.deepEqual(looseConstraints(30, 4), { minW: 0, maxW: 30, minH: 0, maxH: 4 });
  });

  test("validateConstraints accepts int ranges and UNBOUNDED max", () => {
    const c = constraints(0, UNBOUNDED, 5, UNBOUNDED);
    const res = validateConstraints(c);
    assert.equal(res.ok, true);
    if (res.ok) assert.equal(res.value, c);
  });

  test("validateConstraints rejects negative or fractional minimums", () => {
    for (const c of [constraints(-1, 10, 0, 10), constraints(0, 10, 1.5, 10)]) {
      const res = validateConstraints(c);
      assert.equal(res.ok, false);
      if (!res.ok) assert.equal(res.fatal.code, "FOLDBAR_INVALID_PROPS");
    }
  });

  test("validateConstraints rejects max below min and NaN max", () => {
    const inverted = validateConstraints(constraints(20, 10, 0, 10));
    assert.equal(inverted.ok, false);
    if (!inverted.ok) {
      assert.equal(
        inverted.fatal.detail,
        "constraints: maxW/maxH must be int32 >= min or UNBOUNDED (got 10, 10)",
      );
    }
    const nan = validateConstraints(constraints(0, 10, 0, Number.NaN));
    assert.equal(nan.ok, false);
  });

  test("relaxHeight keeps the width range and unbounds height", () => {
    assert.deepEqual(relaxHeight(constraints(10, 300, 40, 120)), {
      minW: 10,
      maxW: 300,
      minH: 0,
      maxH: UNBOUNDED,
    });
  });

  test("constrainConstraints narrows inside the outer range", () => {
    const outer = constraints(0, 100, 0, 50);
    assert.deepEqual(constrainConstraints(outer, constraints(20, UNBOUNDED, 0, UNBOUNDED)), {
      minW: 20,
      maxW: 100,
      minH: 0,
      maxH: 50,
    });
    assert.deepEqual(constrainConstraints(outer, tightConstraints(200, 10)), {
      minW: 100,
      maxW: 100,
      minH: 10,
      maxH: 10,
    });
  });

  test("constrainSize clamps each axis independently", () => {
    const c = constraints(10, 20, 0, UNBOUNDED);
    assert.deepEqual(constrainSize(c, { w: 5, h: 1000 }), { w: 10, h: 1000 });
    assert.deepEqual(constrainSize(c, { w: 25, h: 0 }), { w: 20, h: 0 });
  });

  test("isBounded distinguishes UNBOUNDED", () => {
    assert.equal(isBounded(UNBOUNDED), false);
    assert.equal(isBounded(2147483647), true);
  });
});
