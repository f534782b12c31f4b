import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { Rational } from "./rational.js";

function r(text: string): Rational {
  const n = Rational.parse(text);
  assert.ok(n, `could not parse ${text}`);
  return n;
}

describe("Rational", () => {
  it("parses decimal literals exactly", () => {
    assert.equal(r("1.25").toString(), "1.25");
    assert.equal(r("6.02e2").toString(), "602");
    assert.equal(r("25e-2").toString(), "0.25");
    assert.equal(r("-0.5").toString(), "-0.5");
    assert.equal(Rational.parse("abc"), null);
    assert.equal(Rational.parse("1.2.3"), null);
  });

  it("normalizes sign and common factors", () => {
    const n = Rational.of(6n, -4n);
    assert.equal(n.num, -3n);
    assert.equal(n.den, 2n);
  });

  it("rejects a zero denominator", () => {
    assert.throws(() => Rational.of(1n, 0n), RangeError);
  });

  it("adds decimals without rounding", () => {
    assert.ok(r("0.1").add(r("0.2")).equals(r("0.3")));
  });

  it("prints non-terminating fractions as n/d", () => {
    assert.equal(Rational.of(1n, 3n).toString(), "1/3");
    assert.equal(Rational.of(-2n, 3n).toString(), "-2/3");
  });

  it("divides and multiplies", () => {
    assert.equal(Rational.fromInt(1).div(Rational.fromInt(4)).toString(), "0.25");
    assert.equal(r("1.5").mul(r("4")).toString(), "6");
  });

  it("takes the remainder with the sign of the dividend", () => {
    assert.equal(Rational.fromInt(-7).mod(Rational.fromInt(3)).toString(), "-1");
    assert.equal(Rational.fromInt(7).mod(Rational.fromInt(-3)).toString(), "1");
    assert.equal(r("5.5").mod(Rational.fromInt(2)).toString(), "1.5");
  });

  it("rounds toward negative and positive infinity", () => {
    assert.equal(r("-1.5").floor().toString(), "-2");
    assert.equal(r("-1.5").ceil().toString(), "-1");
    assert.equal(r("2.5").floor().toString(), "2");
    assert.equal(r("2").ceil().toString(), "2");
  });

  it("compares values", () => {
    assert.equal(r("0.5").compare(Rational.of(1n, 3n)), 1);
    assert.equal(r("-2").compare(r("1")), -1);
    assert.equal(r("0.50").compare(Rational.of(1n, 2n)), 0);
  });

  it("converts to numbers", () => {
    assert.equal(r("0.25").toNumber(), 0.25);
    assert.equal(r("-3").toNumber(), -3);
    assert.equal(r("1e400").toNumber(), Infinity);
    const third = r("1e400").add(r("1")).div(r("3e399")).toNumber();
    assert.ok(Math.abs(third - 10 / 3) < 1e-12);
  });
});
