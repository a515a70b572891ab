/**
 * Unit tests for print-package review CLI command handlers
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import chalk from "chalk";
import type Database from "better-sqlite3";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import type { PendingStage } from "@draftline/types";
import { initDatabase } from "../../../src/db.js";
import { defaultConfig } from "../../../src/config.js";
import type { CommandContext } from "../../../src/cli/context.js";
import {
  handleReviewAdvance,
  handleReviewAttach,
  handleReviewCreate,
  handleReviewPending,
  handleReviewRetry,
  handleReviewShow,
} from "../../../src/cli/review-commands.js";
import { createProject } from "../../../src/operations/projects.js";
import { getReview, listStageFiles } from "../../../src/operations/reviews.js";

describe("Review CLI Commands", () => {
  let db: Database.Database;
  let tempDir: string;
  let ctx: CommandContext;
  const now = () => new Date(2025, 10, 3, 9, 0, 0);

  function writeDrawing(name: string): string {
    const filePath = path.join(tempDir, "incoming", name);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "drawing");
    return filePath;
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
    createProject(db, { job_number: "J-1001", customer_name: "Acme" }, now);

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

  describe("handleReviewCreate", () => {
    it("should create stage folders under the print package root", async () => {
      await handleReviewCreate(ctx, "J-1001", { by: "Dana" });

      const basePath = path.join(tempDir, "print-packages", "J-1001");
      expect(console.log).toHaveBeenCalledWith(
        "✓ Started print package review for",
        "J-1001"
      );
      expect(console.log).toHaveBeenCalledWith(`  Folders: ${basePath}`);
      expect(fs.existsSync(path.join(basePath, "7-FINAL Print Package (Approved)"))).toBe(
        true
      );
    });

    it("should refuse a second review for the same job", async () => {
      await handleReviewCreate(ctx, "J-1001", {});
      await expect(handleReviewCreate(ctx, "J-1001", {})).rejects.toThrow(
        "process.exit: 1"
      );
      expect(console.error).toHaveBeenCalledWith("✗ Failed to start review");
    });
  });

  describe("advancing", () => {
    beforeEach(async () => {
      await handleReviewCreate(ctx, "J-1001", {});
    });

    it("should attach, advance and copy files forward", async () => {
      await handleReviewAttach(ctx, "J-1001", writeDrawing("A101.pdf"));
      expect(console.log).toHaveBeenCalledWith("✓ Attached", "A101.pdf", "at stage 0");

      await handleReviewAdvance(ctx, "J-1001", "0", {
        reviewer: "Dana",
        department: "Drafting",
      });

      expect(console.log).toHaveBeenCalledWith(
        "✓ Completed",
        "0-Drafting-Print Package",
        "by Dana"
      );
      expect(console.log).toHaveBeenCalledWith("  Now at", "1-Engineer Review");
      expect(console.log).toHaveBeenCalledWith("  1 file(s) copied forward");
      const [file] = listStageFiles(db, "J-1001");
      expect(file.stage_index).toBe(1);
      expect(file.path).toBe(
        path.join(tempDir, "print-packages", "J-1001", "1-Engineer Review", "A101.pdf")
      );
    });

    it("should store notes given with --notes", async () => {
      await handleReviewAdvance(ctx, "J-1001", "0", {
        reviewer: "Dana",
        department: "Drafting",
        notes: "Sheet A2 reissued",
      });

      expect(getReview(db, "J-1001").stages[0].notes).toBe("Sheet A2 reissued");

      await handleReviewShow(ctx, "J-1001");
      expect(console.log).toHaveBeenCalledWith("Notes:");
      expect(console.log).toHaveBeenCalledWith(
        "  0-Drafting-Print Package: Sheet A2 reissued"
      );
    });

    it("should report files that could not be copied", async () => {
      const drawing = writeDrawing("A102.pdf");
      await handleReviewAttach(ctx, "J-1001", drawing);
      fs.rmSync(drawing);

      await handleReviewAdvance(ctx, "J-1001", "0", {
        reviewer: "Dana",
        department: "Drafting",
      });

      expect(console.log).toHaveBeenCalledWith("\n⚠ 1 file(s) could not be copied:");
      expect(console.log).toHaveBeenCalledWith(`  • A102.pdf: File not found: ${drawing}`);
      expect(listStageFiles(db, "J-1001")[0].stage_index).toBe(0);
    });

    it("should refuse a stage that is not in progress", async () => {
      await expect(
        handleReviewAdvance(ctx, "J-1001", "3", { reviewer: "Dana", department: "Drafting" })
      ).rejects.toThrow("process.exit: 1");
      expect(console.error).toHaveBeenCalledWith(
        "Stage 3 (Drafting Updates (ENG)) is not_started; only an in-progress stage can be completed"
      );
    });

    it("should say when nothing needs retrying", async () => {
      await handleReviewRetry(ctx, "J-1001", []);
      expect(console.log).toHaveBeenCalledWith("No files left behind");
    });

    it("should retry files left behind once they exist again", async () => {
      const drawing = writeDrawing("A103.pdf");
      await handleReviewAttach(ctx, "J-1001", drawing);
      fs.renameSync(drawing, `${drawing}.bak`);
      await handleReviewAdvance(ctx, "J-1001", "0", {
        reviewer: "Dana",
        department: "Drafting",
      });
      fs.renameSync(`${drawing}.bak`, drawing);

      await handleReviewRetry(ctx, "J-1001", ["A103.pdf"]);

      expect(console.log).toHaveBeenCalledWith("✓ Copied", "A103.pdf", "to stage 1");
    });
  });

  describe("handleReviewPending", () => {
    it("should list in-progress stages as JSON", async () => {
      await handleReviewCreate(ctx, "J-1001", {});
      ctx.jsonOutput = true;

      await handleReviewPending(ctx, { department: "Drafting" });

      const calls = vi.mocked(console.log).mock.calls;
      const pending: PendingStage[] = JSON.parse(String(calls[calls.length - 1][0]));
      expect(pending).toHaveLength(1);
      expect(pending[0].job_number).toBe("J-1001");
      expect(pending[0].customer_name).toBe("Acme");
      expect(pending[0].stage_index).toBe(0);
    });

    it("should say when nothing is pending", async () => {
      await handleReviewPending(ctx, { department: "Production" });
      expect(console.log).toHaveBeenCalledWith("No pending reviews");
    });
  });
});
