/**
 * Unit tests for run label validation.
 */

import assert from "node:assert";
import { describe, it } from "node:test";
import {
  ConfigurationError,
  assertRunLabel,
  checkSlug,
  defaultRunLabel,
  describeSlugProblem
} from "../../../util";

describe("checkSlug", () => {
  it("should accept lowercase alphanumerics, underscores and hyphens", () => {
    for (const label of ["tor", "run_1", "nightly-2024", "0-x_"]) {
      assert.equal(checkSlug(label), undefined, `${label} should be valid`);
    }
  });

  it("should reject an empty label", () => {
    assert.deepEqual(checkSlug(""), { type: "empty" });
  });

  it("should reject a leading hyphen", () => {
    assert.deepEqual(checkSlug("-tor"), { type: "leading-hyphen" });
  });

  it("should report a leading hyphen before disallowed characters", () => {
    assert.deepEqual(checkSlug("-A"), { type: "leading-hyphen" });
    assert.deepEqual(checkSlug("- x"), { type: "leading-hyphen" });
  });

  it("should report the first disallowed character", () => {
    assert.deepEqual(checkSlug("tor run"), { type: "bad-character", character: " " });
    assert.deepEqual(checkSlug("Tor"), { type: "bad-character", character: "T" });
    assert.deepEqual(checkSlug("a/b"), { type: "bad-character", character: "/" });
  });

  it("should describe each problem", () => {
    assert.equal(describeSlugProblem({ type: "empty" }), "must not be empty");
    assert.equal(describeSlugProblem({ type: "leading-hyphen" }), "must not start with a hyphen");
    assert.equal(
      describeSlugProblem({ type: "bad-character", character: "." }),
      'contains disallowed character "."'
    );
  });
});

describe("assertRunLabel", () => {
  it("should return a valid label", () => {
    assert.equal(assertRunLabel("nightly_01"), "nightly_01");
  });

  it("should throw a configuration error carrying the label", () => {
    assert.throws(
      () => assertRunLabel("-oops"),
      (err: unknown) => {
        assert.ok(err instanceof ConfigurationError);
        assert.equal(err.value, "-oops");
        assert.equal(err.message, 'Invalid run label "-oops": must not start with a hyphen');
        return true;
      }
    );
  });
});

describe("defaultRunLabel", () => {
  const now = new Date(Date.UTC(2024, 11, 31, 23, 5, 0));

  it("should combine the target with a UTC timestamp", () => {
    assert.equal(defaultRunLabel("tor", now), "tor-20241231-230500");
  });

  it("should squash the target into the slug alphabet", () => {
    assert.equal(defaultRunLabel("Tor/Exit", now), "tor_exit-20241231-230500");
    assert.equal(defaultRunLabel("--tor", now), "tor-20241231-230500");
  });

  it("should fall back to a generic prefix", () => {
    assert.equal(defaultRunLabel("---", now), "run-20241231-230500");
  });

  it("should always produce a valid slug", () => {
    for (const target of ["tor", "Tor/Exit", "--x", "ü", " "]) {
      assert.equal(checkSlug(defaultRunLabel(target, now)), undefined, target);
    }
  });
});
