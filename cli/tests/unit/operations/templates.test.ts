/**
 * Unit tests for versioned workflow templates
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import type Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { TemplateStepInput } from "@draftline/types";
import { closeDatabase, initDatabase } from "../../../src/db.js";
import {
  getActiveTemplate,
  getTemplateVersion,
  hasActiveTemplate,
  listTemplateVersions,
  publishNewVersion,
  validateTemplateSteps,
} from "../../../src/operations/templates.js";
import { NotFoundError, ValidationError } from "../../../src/errors.js";

const now = () => new Date(2025, 10, 3, 9, 0, 0);

const STEPS: TemplateStepInput[] = [
  {
    order_index: 0,
    department: "Engineering",
    group_name: "Design",
    title: "Selections",
    planned_duration_days: 2,
    tasks: ["Select coils", "Select fans"],
  },
  {
    order_index: 1,
    department: "Drafting",
    title: "Drawings",
    planned_duration_days: 3,
  },
];

describe("Template Operations", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = initDatabase({ path: ":memory:" });
  });

  describe("validateTemplateSteps", () => {
    it("should accept a contiguous step list", () => {
      expect(() => validateTemplateSteps(STEPS)).not.toThrow();
    });

    it("should reject an empty step list", () => {
      expect(() => validateTemplateSteps([])).toThrow(
        "Template must have at least one step"
      );
    });

    it("should reject gaps in order_index", () => {
      const steps = [STEPS[0], { ...STEPS[1], order_index: 2 }];
      expect(() => validateTemplateSteps(steps)).toThrow(ValidationError);
    });

    it("should reject duplicate order_index", () => {
      const steps = [STEPS[0], { ...STEPS[1], order_index: 0 }];
      expect(() => validateTemplateSteps(steps)).toThrow(
        "duplicate order_index 0"
      );
    });

    it("should reject negative durations and blank titles", () => {
      const steps = [{ ...STEPS[0], planned_duration_days: -1, title: " " }];
      try {
        validateTemplateSteps(steps);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.details?.issues).toHaveLength(2);
        }
      }
    });
  });

  describe("publishNewVersion", () => {
    it("should publish version 1 as active", () => {
      const template = publishNewVersion(db, "Standard", STEPS, { now });

      expect(template.name).toBe("Standard");
      expect(template.version).toBe(1);
      expect(template.is_active).toBe(true);
      expect(template.created_at).toBe("2025-11-03 09:00:00");
      expect(template.steps.map((s) => s.title)).toEqual([
        "Selections",
        "Drawings",
      ]);
      expect(template.steps[0].tasks).toEqual(["Select coils", "Select fans"]);
      expect(template.steps[1].group_name).toBe("");
    });

    it("should make a second client wait for a publish in progress", () => {
      vi.spyOn(console, "log").mockImplementation(() => {});
      const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "draftline-test-"));
      const dbPath = path.join(tempDir, "shared.db");
      const first = initDatabase({ path: dbPath });
      const second = initDatabase({ path: dbPath, busyTimeout: 50 });
      try {
        // Runs inside the first client's transaction, after its version read
        let blocked: unknown = null;
        const racingClock = () => {
          try {
            publishNewVersion(second, "Standard", STEPS, { now });
          } catch (error) {
            blocked = error;
          }
          return now();
        };

        publishNewVersion(first, "Standard", STEPS, { now: racingClock });
        const v2 = publishNewVersion(second, "Standard", STEPS, { now });

        expect(blocked).toMatchObject({ code: "SQLITE_BUSY" });
        expect(v2.version).toBe(2);
        expect(
          listTemplateVersions(first, "Standard").map((t) => [t.version, t.is_active])
        ).toEqual([
          [2, true],
          [1, false],
        ]);
      } finally {
        closeDatabase(first);
        closeDatabase(second);
        vi.restoreAllMocks();
        fs.rmSync(tempDir, { recursive: true, force: true });
      }
    });

    it("should deactivate the previous version", () => {
      publishNewVersion(db, "Standard", STEPS, { now });
      const v2 = publishNewVersion(db, "Standard", STEPS.slice(0, 1), { now });

      expect(v2.version).toBe(2);
      expect(getActiveTemplate(db, "Standard").id).toBe(v2.id);
      expect(getTemplateVersion(db, "Standard", 1).is_active).toBe(false);
      expect(
        listTemplateVersions(db, "Standard").map((t) => [t.version, t.is_active])
      ).toEqual([
        [2, true],
        [1, false],
      ]);
    });

    it("should never change published steps", () => {
      publishNewVersion(db, "Standard", STEPS, { now });
      const before = JSON.stringify(getTemplateVersion(db, "Standard", 1));

      publishNewVersion(
        db,
        "Standard",
        [{ ...STEPS[0], title: "Renamed", tasks: [] }],
        { now }
      );

      expect(JSON.stringify(getTemplateVersion(db, "Standard", 1))).toBe(before);
      expect(JSON.stringify(getTemplateVersion(db, "Standard", 1))).toBe(
        JSON.stringify(getTemplateVersion(db, "Standard", 1))
      );
    });

    it("should keep versions of other names independent", () => {
      publishNewVersion(db, "Standard", STEPS, { now });
      const rush = publishNewVersion(db, "Rush", STEPS, { now });

      expect(rush.version).toBe(1);
      expect(getActiveTemplate(db, "Standard").version).toBe(1);
    });

    it("should carry tasks forward when a step omits them", () => {
      publishNewVersion(db, "Standard", STEPS, { now });
      const v2 = publishNewVersion(
        db,
        "Standard",
        [
          { ...STEPS[0], tasks: undefined },
          { ...STEPS[1], tasks: ["Title block"] },
        ],
        { now }
      );

      expect(v2.steps[0].tasks).toEqual(["Select coils", "Select fans"]);
      expect(v2.steps[1].tasks).toEqual(["Title block"]);
    });

    it("should persist nothing when validation fails", () => {
      expect(() =>
        publishNewVersion(db, "Standard", [{ ...STEPS[0], department: "" }], {
          now,
        })
      ).toThrow(ValidationError);

      expect(listTemplateVersions(db, "Standard")).toEqual([]);
      expect(hasActiveTemplate(db, "Standard")).toBe(false);
    });

    it("should reject a blank name", () => {
      expect(() => publishNewVersion(db, "  ", STEPS, { now })).toThrow(
        "Template name is required"
      );
    });
  });

  describe("getActiveTemplate", () => {
    it("should throw NotFoundError when nothing is published", () => {
      expect(() => getActiveTemplate(db, "Standard")).toThrow(NotFoundError);
      expect(() => getActiveTemplate(db, "Standard")).toThrow(
        "Active workflow template 'Standard' not found"
      );
    });
  });

  describe("getTemplateVersion", () => {
    it("should throw for an unknown version", () => {
      publishNewVersion(db, "Standard", STEPS, { now });
      expect(() => getTemplateVersion(db, "Standard", 5)).toThrow(
        "Workflow template 'Standard v5' not found"
      );
    });
  });
});
