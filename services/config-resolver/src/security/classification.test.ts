import { describe, expect, it } from "vitest";

import {
  PARTIAL_MASK,
  REDACTION_TOKEN,
  SecurityClassifier,
  inferClassification,
  maskValue,
  parseClassification,
} from "./classification.js";

describe("inferClassification", () => {
  it.each([
    ["smtp.password", "CONFIDENTIAL"],
    ["Payments.API_KEY", "CONFIDENTIAL"],
    ["oauth.client_secret", "CONFIDENTIAL"],
    ["import.timeout.ms", "INTERNAL"],
    ["smtp.host", "INTERNAL"],
    ["app.base.url", "INTERNAL"],
    ["feature.dark_mode", "PUBLIC"],
  ])("classifies %s as %s", (key, expected) => {
    expect(inferClassification(key)).toBe(expected);
  });

  it("prefers CONFIDENTIAL when both marker groups match", () => {
    expect(inferClassification("auth.token.url")).toBe("CONFIDENTIAL");
  });
});

describe("maskValue", () => {
  it("replaces confidential values with a fixed token", () => {
    expect(maskValue("hunter2", "CONFIDENTIAL")).toBe(REDACTION_TOKEN);
    expect(maskValue("a-much-longer-password-value", "CONFIDENTIAL")).toBe(REDACTION_TOKEN);
  });

  it("keeps four characters of internal values", () => {
    expect(maskValue("https://uat.example.com", "INTERNAL")).toBe("http****");
    expect(maskValue("5000", "INTERNAL")).toBe(PARTIAL_MASK);
    expect(maskValue("25", "INTERNAL")).toBe(PARTIAL_MASK);
  });

  it("counts code points rather than UTF-16 units", () => {
    expect(maskValue("ab\u{1F511}cd", "INTERNAL")).toBe("ab\u{1F511}c****");
    expect(maskValue("\u{1F511}\u{1F511}\u{1F511}\u{1F511}", "INTERNAL")).toBe(PARTIAL_MASK);
  });

  it("leaves public values unchanged", () => {
    expect(maskValue("enabled", "PUBLIC")).toBe("enabled");
  });
});

describe("parseClassification", () => {
  it("accepts known values in any case", () => {
    expect(parseClassification(" internal ")).toBe("INTERNAL");
    expect(parseClassification("SECRET")).toBeUndefined();
    expect(parseClassification(null)).toBeUndefined();
  });
});

describe("SecurityClassifier", () => {
  it("treats an empty key as public", () => {
    expect(new SecurityClassifier().classify("")).toBe("PUBLIC");
  });

  it("lets registered classifications override inference", () => {
    const classifier = new SecurityClassifier();
    expect(classifier.classify("billing.account")).toBe("PUBLIC");

    classifier.registerExplicit("billing.account", "CONFIDENTIAL");

    expect(classifier.classify("billing.account")).toBe("CONFIDENTIAL");
    expect(classifier.maskForKey("billing.account", "acct-1234")).toBe(REDACTION_TOKEN);
  });

  it("ignores an absent classification", () => {
    const classifier = new SecurityClassifier();
    classifier.registerExplicit("smtp.host", undefined);
    expect(classifier.classify("smtp.host")).toBe("INTERNAL");
  });

  it("masks null and undefined to undefined", () => {
    const classifier = new SecurityClassifier();
    expect(classifier.mask(null, "CONFIDENTIAL")).toBeUndefined();
    expect(classifier.mask(undefined, "PUBLIC")).toBeUndefined();
  });

  it("never returns a confidential value or a substring of it", () => {
    const classifier = new SecurityClassifier();
    const secret = "hunter2";
    const masked = classifier.maskForKey("db.password", secret) ?? "";
    for (let length = 1; length <= secret.length; length += 1) {
      for (let start = 0; start + length <= secret.length; start += 1) {
        expect(masked).not.toContain(secret.slice(start, start + length));
      }
    }
  });
});
