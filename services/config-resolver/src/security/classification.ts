export const CLASSIFICATIONS = ["PUBLIC", "INTERNAL", "CONFIDENTIAL"] as const;

export type Classification = (typeof CLASSIFICATIONS)[number];

export const REDACTION_TOKEN = "[REDACTED]";
export const PARTIAL_MASK = "****";
const VISIBLE_PREFIX_LENGTH = 4;

export type ClassificationRule = {
  classification: Exclude<Classification, "PUBLIC">;
  markers: readonly string[];
};

/**
 * Ordered rules; the first rule with a marker contained in the lower-cased
 * key decides. Keys matching nothing are PUBLIC.
 */
export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    classification: "CONFIDENTIAL",
    markers: ["password", "secret", "token", "api_key", "apikey", "private_key", "credential"],
  },
  {
    classification: "INTERNAL",
    markers: ["url", "timeout", "batch", "limit", "host", "port", "path"],
  },
];

export function isClassification(value: unknown): value is Classification {
  return typeof value === "string" && (CLASSIFICATIONS as readonly string[]).includes(value);
}

export function parseClassification(value: unknown): Classification | undefined {
  if (typeof value !== "string") {
    return undefined;
  }
  const upper = value.trim().toUpperCase();
  return isClassification(upper) ? upper : undefined;
}

export function inferClassification(
  key: string,
  rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES,
): Classification {
  const lowerKey = key.toLowerCase();
  for (const rule of rules) {
    if (rule.markers.some((marker) => lowerKey.includes(marker))) {
      return rule.classification;
    }
  }
  return "PUBLIC";
}

/**
 * Display form of a value. CONFIDENTIAL values become a fixed token that
 * reveals neither length nor content; INTERNAL values keep their first four
 * code points.
 */
export function maskValue(value: string, classification: Classification): string {
  switch (classification) {
    case "CONFIDENTIAL":
      return REDACTION_TOKEN;
    case "INTERNAL": {
      const codePoints = Array.from(value);
      if (codePoints.length <= VISIBLE_PREFIX_LENGTH) {
        return PARTIAL_MASK;
      }
      return `${codePoints.slice(0, VISIBLE_PREFIX_LENGTH).join("")}${PARTIAL_MASK}`;
    }
    default:
      return value;
  }
}

/**
 * Classifies configuration keys. Classifications recorded from store
 * metadata take precedence over the rule table; inferred results are
 * memoized per key.
 */
export class SecurityClassifier {
  private readonly rules: readonly ClassificationRule[];
  private readonly explicit = new Map<string, Classification>();
  private readonly inferred = new Map<string, Classification>();

  constructor(rules: readonly ClassificationRule[] = DEFAULT_CLASSIFICATION_RULES) {
    this.rules = rules;
  }

  classify(key: string | null | undefined): Classification {
    if (!key) {
      return "PUBLIC";
    }
    const explicit = this.explicit.get(key);
    if (explicit) {
      return explicit;
    }
    const memoized = this.inferred.get(key);
    if (memoized) {
      return memoized;
    }
    const classification = inferClassification(key, this.rules);
    this.inferred.set(key, classification);
    return classification;
  }

  /**
   * Records the classification a store entry carries. Entries without one
   * leave inference in charge.
   */
  registerExplicit(key: string, classification: Classification | undefined): void {
    if (!classification) {
      return;
    }
    this.explicit.set(key, classification);
  }

  mask(value: string | null | undefined, classification: Classification): string | undefined {
    if (value === null || value === undefined) {
      return undefined;
    }
    return maskValue(value, classification);
  }

  maskForKey(key: string, value: string | null | undefined): string | undefined {
    return this.mask(value, this.classify(key));
  }
}
