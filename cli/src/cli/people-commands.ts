/**
 * CLI handlers for the designer and engineer rosters
 */

import chalk from "chalk";
import Table from "cli-table3";
import { ValidationError } from "../errors.js";
import type { PersonKind } from "@draftline/types";
import {
  addPerson,
  isPersonKind,
  listPeople,
  listPeopleByKind,
  removePerson,
} from "../operations/people.js";
import { failCommand, type CommandContext } from "./context.js";

function requireKind(kind: string): PersonKind {
  if (!isPersonKind(kind)) {
    throw new ValidationError(
      `Invalid kind '${kind}'. Must be one of: designer, engineer`
    );
  }
  return kind;
}

export async function handlePeopleAdd(
  ctx: CommandContext,
  kind: string,
  name: string
): Promise<void> {
  try {
    const added = addPerson(ctx.db, requireKind(kind), name);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ kind, name: name.trim(), added }, null, 2));
      return;
    }

    if (added) {
      console.log(chalk.green(`✓ Added ${kind}`), chalk.cyan(name.trim()));
    } else {
      console.log(chalk.yellow(`${name.trim()} is already listed as a ${kind}`));
    }
  } catch (error) {
    failCommand("add person", error);
  }
}

export async function handlePeopleRemove(
  ctx: CommandContext,
  kind: string,
  name: string
): Promise<void> {
  try {
    const removed = removePerson(ctx.db, requireKind(kind), name);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ kind, name: name.trim(), removed }, null, 2));
      return;
    }

    if (removed) {
      console.log(chalk.green(`✓ Removed ${kind}`), chalk.cyan(name.trim()));
    } else {
      console.log(chalk.yellow(`${name.trim()} is not listed as a ${kind}`));
    }
  } catch (error) {
    failCommand("remove person", error);
  }
}

export async function handlePeopleList(ctx: CommandContext): Promise<void> {
  try {
    const designers = listPeopleByKind(ctx.db, "designer");
    const engineers = listPeopleByKind(ctx.db, "engineer");

    if (ctx.jsonOutput) {
      console.log(
        JSON.stringify(
          {
            designers,
            engineers,
            actors: listPeople(ctx.db, ctx.config.productionActor),
          },
          null,
          2
        )
      );
      return;
    }

    const table = new Table({
      head: [chalk.cyan("Name"), chalk.cyan("Role")],
    });
    for (const name of designers) table.push([name, "designer"]);
    for (const name of engineers) table.push([name, "engineer"]);
    table.push([ctx.config.productionActor, chalk.gray("production")]);

    console.log(table.toString());
  } catch (error) {
    failCommand("list people", error);
  }
}
