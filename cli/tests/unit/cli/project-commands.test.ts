/**
 * Unit tests for project CLI command handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import chalk from "chalk";
import type Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { initDatabase } from "../../../src/db.js";
import { defaultConfig } from "../../../src/config.js";
import type { CommandContext } from "../../../src/cli/context.js";
import {
  handleProjectAdd,
  handleProjectDue,
  handleProjectDuplicate,
  handleProjectList,
} from "../../../src/cli/project-commands.js";
import { publishNewVersion } from "../../../src/operations/templates.js";
import { getProjectByJobNumber } from "../../../src/operations/projects.js";
import { getInstance, hasInstance } from "../../../src/operations/project-workflow.js";

describe("Project CLI Commands", () => {
  let db: Database.Database;
  let tempDir: string;
  let ctx: CommandContext;
  const now = () => new Date(2025, 10, 3, 9, 0, 0);

  function lastJson(): unknown {
    const calls = vi.mocked(console.log).mock.calls;
    return JSON.parse(String(calls[calls.length - 1][0]));
  }

  function dueDates(jobNumber: string): (string | null)[] {
    const project = getProjectByJobNumber(db, jobNumber);
    if (!project) throw new Error(`missing ${jobNumber}`);
    return getInstance(db, project.id).steps.map((s) => s.planned_due_date);
  }

  beforeEach(() => {
    chalk.level = 0;
    db = initDatabase({ path: ":memory:" });
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "draftline-test-"));
    ctx = {
      db,
      configDir: tempDir,
      config: defaultConfig(tempDir),
      jsonOutput: false,
      now,
    };
    publishNewVersion(
      db,
      "Standard",
      [
        { order_index: 0, department: "Engineering", title: "Selections", planned_duration_days: 1 },
        { order_index: 1, department: "Drafting", title: "Drawings", planned_duration_days: 2 },
        { order_index: 2, department: "Production", title: "Release", planned_duration_days: 3 },
      ],
      { now }
    );

    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`process.exit: ${code}`);
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe("handleProjectAdd", () => {
    it("should create the project and seed its workflow", async () => {
      await handleProjectAdd(ctx, "J-1001", { customer: "Acme", due: "2025-11-14" });

      expect(console.log).toHaveBeenCalledWith("✓ Added project", "J-1001");
      expect(console.log).toHaveBeenCalledWith(
        "  Workflow seeded from Standard v1 (3 steps)"
      );
      expect(dueDates("J-1001")).toEqual(["2025-11-07", "2025-11-11", "2025-11-14"]);
    });

    it("should skip seeding without an active template", async () => {
      ctx.config = { ...ctx.config, templateName: "Rush" };

      await handleProjectAdd(ctx, "J-1001", {});

      expect(console.log).toHaveBeenCalledWith(
        "  No active Rush template; workflow not seeded"
      );
      const project = getProjectByJobNumber(db, "J-1001");
      expect(project).not.toBeNull();
      expect(hasInstance(db, project?.id ?? 0)).toBe(false);
    });

    it("should exit with an error for a malformed due date", async () => {
      await expect(
        handleProjectAdd(ctx, "J-1001", { due: "2025-13-01" })
      ).rejects.toThrow("process.exit: 1");

      expect(console.error).toHaveBeenCalledWith("✗ Failed to add project");
      expect(getProjectByJobNumber(db, "J-1001")).toBeNull();
    });

    it("should refuse a duplicate job number", async () => {
      await handleProjectAdd(ctx, "J-1001", {});
      await expect(handleProjectAdd(ctx, "J-1001", {})).rejects.toThrow(
        "process.exit: 1"
      );
      expect(console.error).toHaveBeenCalledWith("Project J-1001 already exists");
    });
  });

  describe("handleProjectList", () => {
    it("should print JSON records", async () => {
      await handleProjectAdd(ctx, "J-1001", { customer: "Acme" });
      ctx.jsonOutput = true;

      await handleProjectList(ctx);

      expect(lastJson()).toEqual([
        {
          id: 1,
          job_number: "J-1001",
          customer_name: "Acme",
          job_directory: null,
          due_date: null,
          created_at: "2025-11-03 09:00:00",
        },
      ]);
    });

    it("should say when there are no projects", async () => {
      await handleProjectList(ctx);
      expect(console.log).toHaveBeenCalledWith("No projects found");
    });
  });

  describe("handleProjectDue", () => {
    beforeEach(async () => {
      await handleProjectAdd(ctx, "J-1001", { due: "2025-11-14" });
    });

    it("should reschedule from the new date", async () => {
      await handleProjectDue(ctx, "J-1001", "2025-11-21");

      expect(console.log).toHaveBeenCalledWith(
        "✓ Due date of",
        "J-1001",
        "set to",
        "2025-11-21"
      );
      expect(dueDates("J-1001")).toEqual(["2025-11-14", "2025-11-18", "2025-11-21"]);
    });

    it("should clear the date with 'none'", async () => {
      await handleProjectDue(ctx, "J-1001", "none");

      expect(getProjectByJobNumber(db, "J-1001")?.due_date).toBeNull();
      expect(dueDates("J-1001")).toEqual([null, null, null]);
    });
  });

  describe("handleProjectDuplicate", () => {
    it("should create the target job with the source's customer", async () => {
      await handleProjectAdd(ctx, "J-1001", { customer: "Acme", due: "2025-11-14" });

      await handleProjectDuplicate(ctx, "J-1001", "J-1002");

      expect(console.log).toHaveBeenCalledWith(
        "✓ Duplicated workflow of",
        "J-1001",
        "to",
        "J-1002"
      );
      expect(getProjectByJobNumber(db, "J-1002")?.customer_name).toBe("Acme");
      expect(dueDates("J-1002")).toEqual([null, null, null]);
    });

    it("should fail for an unknown source", async () => {
      await expect(handleProjectDuplicate(ctx, "J-404", "J-1002")).rejects.toThrow(
        "process.exit: 1"
      );
      expect(getProjectByJobNumber(db, "J-1002")).toBeNull();
    });
  });
});
