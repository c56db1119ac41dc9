import { describe, expect, it } from "vitest";
import { RegressionClassifier } from "../src/classify/engine.js";
import { DEFAULT_CONFIG } from "../src/config/loader.js";
import { PredictionServiceTimeoutError, SourcesNotFoundError } from "../src/errors.js";
import type { PushStatus, ToRetriggerOrBackfill } from "../src/types/classification.js";
import type { DecisionConfig } from "../src/types/config.js";
import { FakePush, fiveGroups, type FakeGroup } from "./helpers/fake-push.js";

function classifier(decision: Partial<DecisionConfig> = {}): RegressionClassifier {
  return new RegressionClassifier({
    thresholds: DEFAULT_CONFIG.thresholds,
    decision: { ...DEFAULT_CONFIG.decision, ...decision },
  });
}

/** Matches the table where a consistent, evidence-free known failure stays unresolved. */
const strict = () => classifier({ known_consistent_without_evidence: "unknown" });

function names(set: Set<string>): string[] {
  return [...set].sort();
}

function actionSets(t: ToRetriggerOrBackfill) {
  return {
    real_retrigger: names(t.real_retrigger),
    intermittent_retrigger: names(t.intermittent_retrigger),
    backfill: names(t.backfill),
  };
}

const NEW = "new failure not classified";
const KNOWN = "not classified";

describe("classification engine", () => {
  describe("single-group cases", () => {
    type Case = [
      confidence: number | null,
      likely: boolean,
      possible: boolean,
      confirmed: boolean | null,
      crossConfig: boolean | null,
      freshness: "new" | "not new",
      status: PushStatus,
      action: string | null,
    ];

    // prettier-ignore
    const cases: Case[] = [
      [0.99, true, true, null, true, "not new", "BAD", null],
      [null, true, true, null, true, "new", "BAD", null],
      [0.01, true, true, null, true, "new", "BAD", null],
      [0.99, false, false, null, true, "new", "UNKNOWN", null],
      [0.99, false, false, null, true, "not new", "UNKNOWN", null],
      [0.99, false, false, null, false, "new", "UNKNOWN", null],
      [0.01, false, false, null, true, "not new", "UNKNOWN", null],
      [0.01, false, false, null, true, "new", "UNKNOWN", null],
      [null, false, false, null, true, "not new", "UNKNOWN", null],
      [null, false, false, null, true, "new", "UNKNOWN", null],
      [0.99, true, true, null, false, "new", "UNKNOWN", null],
      [0.01, true, true, null, true, "not new", "UNKNOWN", null],
      [null, true, true, null, true, "not new", "UNKNOWN", null],
      [null, false, false, null, false, "not new", "GOOD", null],
      [null, true, true, null, false, "new", "GOOD", null],
      [0.01, true, true, null, false, "not new", "GOOD", null],
      [null, true, true, null, false, "not new", "GOOD", null],
      [0.99, false, false, null, false, "not new", "GOOD", null],
      [0.99, true, true, null, false, "not new", "GOOD", null],
      [0.01, true, true, null, false, "new", "GOOD", null],
      [0.01, false, false, null, false, "not new", "GOOD", null],
      [0.01, false, false, null, false, "new", "GOOD", null],
      [null, false, false, null, false, "new", "GOOD", null],
      [0.99, true, true, null, null, "not new", "UNKNOWN", "real|intermittent"],
      [0.99, true, true, null, null, "new", "UNKNOWN", "real"],
      [0.99, false, false, null, null, "not new", "UNKNOWN", "intermittent"],
      [0.99, false, false, null, null, "new", "UNKNOWN", null],
      [0.01, true, true, null, null, "not new", "UNKNOWN", "intermittent"],
      [0.01, true, true, null, null, "new", "UNKNOWN", "real|intermittent"],
      [0.01, false, false, null, null, "not new", "UNKNOWN", "intermittent"],
      [0.01, false, false, null, null, "new", "UNKNOWN", "intermittent"],
      [null, true, true, null, null, "not new", "UNKNOWN", "intermittent"],
      [null, true, true, null, null, "new", "UNKNOWN", "real|intermittent"],
      [null, false, false, null, null, "not new", "UNKNOWN", "intermittent"],
      [null, false, false, null, null, "new", "UNKNOWN", "intermittent"],
      [0.99, false, true, null, true, "new", "UNKNOWN", "backfill"],
      [0.99, false, true, null, true, "not new", "UNKNOWN", "backfill"],
      [0.99, false, true, null, false, "new", "UNKNOWN", null],
      [0.01, false, true, null, true, "not new", "UNKNOWN", null],
      [0.01, false, true, null, true, "new", "UNKNOWN", "backfill"],
      [null, false, true, null, true, "not new", "UNKNOWN", null],
      [null, false, true, null, true, "new", "UNKNOWN", "backfill"],
      [null, false, true, null, false, "not new", "GOOD", null],
      [0.99, false, true, null, false, "not new", "GOOD", null],
      [0.01, false, true, null, false, "not new", "GOOD", null],
      [0.01, false, true, null, false, "new", "GOOD", null],
      [null, false, true, null, false, "new", "GOOD", null],
      [0.99, false, true, null, null, "not new", "UNKNOWN", "backfill|intermittent"],
      [0.99, false, true, null, null, "new", "UNKNOWN", "backfill"],
      [0.01, false, true, null, null, "not new", "UNKNOWN", "intermittent"],
      [0.01, false, true, null, null, "new", "UNKNOWN", "backfill|intermittent"],
      [null, false, true, null, null, "not new", "UNKNOWN", "intermittent"],
      [null, false, true, null, null, "new", "UNKNOWN", "backfill|intermittent"],
      [null, false, true, false, null, "not new", "GOOD", "intermittent"],
      [null, true, false, true, null, "new", "BAD", "real"],
    ];

    it.each(cases)(
      "confidence=%s likely=%s possible=%s confirmed=%s crossConfig=%s %s → %s (%s)",
      async (confidence, likely, possible, confirmed, crossConfig, freshness, status, action) => {
        const push = new FakePush({
          groups: {
            group1: { confirmed, crossConfig, classifications: [freshness === "new" ? NEW : KNOWN] },
          },
          selection: { groups: confidence === null ? {} : { group1: confidence } },
          likely: likely ? ["group1"] : [],
          possible: possible ? ["group1"] : [],
        });

        const [pushStatus, regressions, toRetrigger] = await strict().classify(push, {
          unknownFromRegressions: false,
          considerChildrenPushesConfigs: false,
        });

        expect(pushStatus).toBe(status);
        const verdict = status === "BAD" ? "real" : status === "GOOD" ? "intermittent" : "unknown";
        expect(Object.keys(regressions[verdict])).toEqual(["group1"]);

        const planned = confirmed === null ? (action ?? "") : "";
        expect(actionSets(toRetrigger)).toEqual({
          real_retrigger: planned.includes("real") ? ["group1"] : [],
          intermittent_retrigger: planned.includes("intermittent") ? ["group1"] : [],
          backfill: planned.includes("backfill") ? ["group1"] : [],
        });
      },
    );
  });

  describe("documented scenarios", () => {
    it("consistent, confident, likely, new failure is real with no follow-up", async () => {
      const push = new FakePush({
        groups: { group1: { crossConfig: true, classifications: [NEW] } },
        selection: { groups: { group1: 0.99 } },
        likely: ["group1"],
        possible: ["group1"],
      });
      const [status, regressions, actions] = await classifier().classify(push);
      expect(status).toBe("BAD");
      expect(Object.keys(regressions.real)).toEqual(["group1"]);
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: [], backfill: [] });
    });

    it("confident known failure of unknown consistency gets an intermittent retrigger only", async () => {
      const push = new FakePush({
        groups: { group1: { crossConfig: null, classifications: [KNOWN] } },
        selection: { groups: { group1: 0.9 } },
      });
      const [status, , actions] = await classifier().classify(push);
      expect(status).toBe("UNKNOWN");
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: ["group1"], backfill: [] });
    });

    it("possible new regression without a score gets a backfill and an intermittent retrigger", async () => {
      const push = new FakePush({
        groups: { group1: { crossConfig: null, classifications: [NEW] } },
        possible: ["group1"],
      });
      const [status, , actions] = await classifier().classify(push);
      expect(status).toBe("UNKNOWN");
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: ["group1"], backfill: ["group1"] });
    });

    it("confirmation overrides every other signal", async () => {
      const push = new FakePush({
        groups: {
          confirmed: { confirmed: true, crossConfig: false },
          refuted: { confirmed: false, crossConfig: true, classifications: [NEW] },
        },
        selection: { groups: { confirmed: 0.1, refuted: 0.99 } },
        likely: ["refuted"],
      });
      const evaluation = await classifier().evaluate(push);
      expect(Object.keys(evaluation.regressions.real)).toEqual(["confirmed"]);
      expect(Object.keys(evaluation.regressions.intermittent)).toEqual(["refuted"]);
      expect(evaluation.decisions.map((d) => [d.name, d.rule, d.tiers])).toEqual([
        ["confirmed", "confirmed-failure", null],
        ["refuted", "refuted-failure", null],
      ]);
      expect(actionSets(evaluation.toRetriggerOrBackfill)).toEqual({
        real_retrigger: [],
        intermittent_retrigger: [],
        backfill: [],
      });
    });
  });

  describe("almost good pushes", () => {
    it("cross-config failures with low or no confidence stay unknown", async () => {
      const push = new FakePush({
        groups: fiveGroups(() => ({ crossConfig: true })),
        selection: { groups: { group1: 0.7, group2: 0.3 } },
      });
      const [status, regressions, actions] = await strict().classify(push, {
        unknownFromRegressions: false,
        considerChildrenPushesConfigs: false,
      });
      expect(status).toBe("UNKNOWN");
      expect(Object.keys(regressions.unknown)).toEqual(["group1", "group2", "group3", "group4", "group5"]);
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: [], backfill: [] });
    });

    it("inconsistent new failures with high confidence are held as unknown", async () => {
      const push = new FakePush({
        groups: fiveGroups(() => ({ crossConfig: false, classifications: [NEW] })),
        selection: { groups: { group1: 0.85, group2: 0.85, group3: 0.85, group4: 0.85, group5: 0.85 } },
      });
      const [status, regressions] = await strict().classify(push, {
        unknownFromRegressions: false,
        considerChildrenPushesConfigs: false,
      });
      expect(status).toBe("UNKNOWN");
      expect(Object.keys(regressions.unknown)).toHaveLength(5);
    });

    it("retriggers only the groups of unknown consistency", async () => {
      const crossConfig: Record<string, boolean | null> = {
        group1: null,
        group2: true,
        group3: null,
        group4: true,
        group5: null,
      };
      const push = new FakePush({
        groups: fiveGroups((name) => ({ crossConfig: crossConfig[name] ?? null })),
        selection: { groups: { group1: 0.7, group2: 0.85, group3: 0.3, group4: 0.85, group5: 0.3 } },
      });
      const [status, , actions] = await strict().classify(push, {
        unknownFromRegressions: false,
        considerChildrenPushesConfigs: false,
      });
      expect(status).toBe("UNKNOWN");
      expect(actionSets(actions)).toEqual({
        real_retrigger: [],
        intermittent_retrigger: ["group1", "group3", "group5"],
        backfill: [],
      });
    });
  });

  it("a push whose failures are all inconsistent is good", async () => {
    const push = new FakePush({
      groups: fiveGroups(() => ({ crossConfig: false })),
      selection: { groups: { group1: 0.7, group2: 0.3 } },
      likely: ["group3", "group4"],
    });
    const [status, regressions, actions] = await classifier().classify(push, { considerChildrenPushesConfigs: false });
    expect(status).toBe("GOOD");
    expect(Object.keys(regressions.intermittent)).toHaveLength(5);
    expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: [], backfill: [] });
  });

  describe("almost bad pushes", () => {
    const opts = { unknownFromRegressions: false, considerChildrenPushesConfigs: false } as const;
    const allLikely = ["group1", "group2", "group3", "group4", "group5"];
    const highScores = { groups: { group1: 0.92, group2: 0.92, group3: 0.92, group4: 0.92, group5: 0.92 } };

    it("likely consistent regressions without a score stay unknown", async () => {
      const push = new FakePush({ groups: fiveGroups(() => ({ crossConfig: true })), likely: allLikely });
      const [status, , actions] = await strict().classify(push, opts);
      expect(status).toBe("UNKNOWN");
      expect(actionSets(actions).intermittent_retrigger).toEqual([]);
    });

    it("likely regressions of unknown consistency without a score get intermittent retriggers", async () => {
      const push = new FakePush({ groups: fiveGroups(() => ({ crossConfig: null })), likely: allLikely });
      const [, , actions] = await strict().classify(push, opts);
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: allLikely, backfill: [] });
    });

    it("confident consistent failures that are not regressions stay unknown", async () => {
      const push = new FakePush({ groups: fiveGroups(() => ({ crossConfig: true })), selection: highScores });
      const [status, regressions] = await strict().classify(push, opts);
      expect(status).toBe("UNKNOWN");
      expect(Object.keys(regressions.unknown)).toEqual(allLikely);
    });

    it("confident new likely regressions that are inconsistent stay unknown", async () => {
      const push = new FakePush({
        groups: fiveGroups(() => ({ crossConfig: false, classifications: [NEW] })),
        selection: highScores,
        likely: allLikely,
      });
      const [status, , actions] = await strict().classify(push, opts);
      expect(status).toBe("UNKNOWN");
      expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: [], backfill: [] });
    });

    it("confident new likely regressions of unknown consistency get real retriggers", async () => {
      const push = new FakePush({
        groups: fiveGroups(() => ({ crossConfig: null, classifications: [NEW] })),
        selection: highScores,
        likely: allLikely,
      });
      const [, , actions] = await strict().classify(push, opts);
      expect(actionSets(actions)).toEqual({ real_retrigger: allLikely, intermittent_retrigger: [], backfill: [] });
    });
  });

  it("a push with some real failures is bad", async () => {
    const push = new FakePush({
      groups: {
        group1: { crossConfig: true },
        group2: { crossConfig: false, classifications: [NEW] },
        group3: { crossConfig: true },
        group4: { crossConfig: false },
        group5: { crossConfig: true },
      },
      selection: { groups: { group1: 0.99, group2: 0.95, group3: 0.91 } },
      likely: ["group1", "group2", "group3"],
    });
    const [status, regressions, actions] = await strict().classify(push, {
      unknownFromRegressions: false,
      considerChildrenPushesConfigs: false,
    });
    expect(status).toBe("BAD");
    expect(Object.keys(regressions.real)).toEqual(["group1", "group3"]);
    expect(Object.keys(regressions.intermittent)).toEqual(["group4"]);
    expect(Object.keys(regressions.unknown)).toEqual(["group2", "group5"]);
    expect(actionSets(actions)).toEqual({ real_retrigger: [], intermittent_retrigger: [], backfill: [] });
  });

  describe("configuration and options", () => {
    it("treats a consistent known failure without evidence as intermittent by default", async () => {
      const push = new FakePush({ groups: { group1: { crossConfig: true } } });
      const evaluation = await classifier().evaluate(push);
      expect(evaluation.status).toBe("GOOD");
      expect(evaluation.decisions[0]?.rule).toBe("consistent-known-no-evidence");
    });

    it("holds inconsistent confident new failures only when they could regress, if so configured", async () => {
      const push = new FakePush({
        groups: { group1: { crossConfig: false, classifications: [NEW] } },
        selection: { groups: { group1: 0.95 } },
      });
      const [status] = await classifier({ inconsistent_hold_requires_regression: true }).classify(push);
      expect(status).toBe("GOOD");
    });

    it("backfills unresolved regressions when unknownFromRegressions is on", async () => {
      const push = new FakePush({
        groups: { group1: { crossConfig: true } },
        selection: { groups: { group1: 0.5 } },
        likely: ["group1"],
      });
      const on = await classifier().evaluate(push, { considerChildrenPushesConfigs: false });
      expect(on.decisions[0]?.rule).toBe("consistent+regression-backfill");
      expect(names(on.toRetriggerOrBackfill.backfill)).toEqual(["group1"]);

      const off = await classifier().evaluate(push, { unknownFromRegressions: false, considerChildrenPushesConfigs: false });
      expect(off.decisions[0]?.rule).toBe("consistent");
      expect(names(off.toRetriggerOrBackfill.backfill)).toEqual([]);
    });

    it("asks the widened consistency check when children pushes are considered", async () => {
      const push = new FakePush({ groups: { group1: { crossConfig: null, configConsistent: true } } });
      const counts = { configurations: 3, failures: 2 };

      const widened = await classifier().evaluate(push, { consistentFailuresCounts: counts });
      expect(widened.decisions[0]?.tiers?.consistency).toBe("consistent");

      const narrow = await classifier().evaluate(push, {
        consistentFailuresCounts: counts,
        considerChildrenPushesConfigs: false,
      });
      expect(narrow.decisions[0]?.tiers?.consistency).toBe("unknown");

      expect(push.summaries.get("group1")?.calls).toEqual([
        { method: "isConfigConsistentFailure", counts },
        { method: "isCrossConfigFailure", counts },
      ]);
    });

    it("keeps the verdict of a running group but plans nothing for it", async () => {
      const push = new FakePush({ groups: { group1: { crossConfig: null } }, running: ["group1"] });
      const evaluation = await classifier().evaluate(push);
      expect(evaluation.decisions[0]).toMatchObject({ verdict: "unknown", running: true, actions: [] });
      expect(actionSets(evaluation.toRetriggerOrBackfill).intermittent_retrigger).toEqual([]);
    });

    it("skips passing and excluded groups", async () => {
      const groups: Record<string, FakeGroup> = {
        "dom/base/test/mochitest.ini": { crossConfig: true },
        "devtools/client/browser.ini": { crossConfig: true },
        "layout/reftest.list": { status: "pass" },
      };
      const push = new FakePush({ groups });
      const [status, regressions] = await classifier({ excluded_groups: ["devtools/**"] }).classify(push);
      expect(status).toBe("GOOD");
      expect(Object.keys(regressions.intermittent)).toEqual(["dom/base/test/mochitest.ini"]);
      expect(Object.keys(regressions.unknown)).toEqual([]);
    });

    it("records the failing tasks of each group as evidence", async () => {
      const push = new FakePush({ groups: { group1: { crossConfig: false } } });
      const [, regressions] = await classifier().classify(push);
      expect(regressions.intermittent.group1?.map((t) => t.id)).toEqual(["group1-task"]);
    });

    it("puts every failing group in exactly one verdict", async () => {
      const push = new FakePush({
        groups: fiveGroups((name) => ({ crossConfig: name === "group1" ? true : name === "group2" ? false : null })),
        selection: { groups: { group1: 0.9 } },
        likely: ["group1"],
      });
      const [regressions] = await classifier().classifyRegressions(push);
      const all = [
        ...Object.keys(regressions.real),
        ...Object.keys(regressions.intermittent),
        ...Object.keys(regressions.unknown),
      ].sort();
      expect(all).toEqual(["group1", "group2", "group3", "group4", "group5"]);
    });

    it("keeps a group named __proto__ as an ordinary key", async () => {
      const push = new FakePush({
        groups: { ["__proto__"]: { crossConfig: true, classifications: [NEW] } },
        selection: { groups: { ["__proto__"]: 0.9 } },
        likely: ["__proto__"],
      });
      const [status, regressions] = await classifier().classify(push);

      expect(status).toBe("BAD");
      expect(Object.keys(regressions.real)).toEqual(["__proto__"]);
      expect(Object.hasOwn(regressions.real, "__proto__")).toBe(true);
      expect(Object.keys(regressions.unknown)).toEqual([]);
    });
  });

  describe("upstream failures", () => {
    it("propagates an exhausted evidence chain", async () => {
      const push = new FakePush({
        groups: { group1: {} },
        selectionError: new SourcesNotFoundError("push_test_selection_data"),
      });
      await expect(classifier().classify(push)).rejects.toThrow(
        "No registered sources were able to fulfill 'push_test_selection_data'!",
      );
    });

    it("propagates the prediction service timeout", async () => {
      const push = new FakePush({ groups: { group1: {} }, selectionError: new PredictionServiceTimeoutError(3000) });
      await expect(classifier().classify(push)).rejects.toBeInstanceOf(PredictionServiceTimeoutError);
    });
  });
});
