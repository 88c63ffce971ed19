import type { z } from "zod";
import { logger } from "../config/logger.js";
import { blankToNull, botDefaults, knowledgeEntryDefaults, withDefaults } from "../domain/defaults.js";
import {
  type KnowledgeOption,
  type NewBot,
  type NewKnowledgeEntry,
  newBotSchema,
  newKnowledgeEntrySchema,
  REQUIRED_BOT_FIELDS,
} from "../domain/entities/index.js";
import { NotFoundError, ValidationError } from "../domain/errors.js";
import type { EntityRepository, LinkSynchronizer } from "../domain/repositories/index.js";
import {
  assertTableName,
  type CellValue,
  type ColumnName,
  IDENTIFIER_COLUMNS,
  isCellValue,
  isColumnOf,
  parseKnowledgeKeys,
  type TableName,
} from "../domain/tables.js";
import { failure, type OperationStatus, type PartialFailure, partialFailure, success } from "./operation-status.js";
import { applyView, type TableView, type ViewRequest, type ViewRow } from "./view-settings.js";

export type RecordValues = Readonly<Record<string, unknown>>;

export interface ConsoleServiceOptions {
  entities: EntityRepository;
  links: LinkSynchronizer;
  /** Pre-fills the owner and foundation fields of new bots. */
  botOwner: string;
  now?: () => Date;
}

const REQUIRED_FIELD_SET: ReadonlySet<string> = new Set(REQUIRED_BOT_FIELDS);

/** Identifiers arrive as path segments; integer key columns need a positive integer. */
export function parseRowKey(raw: string, column: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(value) || value <= 0) {
    throw new ValidationError(`${column} must be a positive integer, got "${raw}"`, [column]);
  }
  return value;
}

/**
 * Turn submitted form values into column assignments for one table.
 * Unknown columns, locked columns and non-scalar values are rejected.
 */
function cellsFor<T extends TableName>(
  table: T,
  values: RecordValues,
  locked: readonly string[],
): Partial<Record<ColumnName<T>, CellValue>> {
  const cells: Partial<Record<ColumnName<T>, CellValue>> = {};
  for (const [column, value] of Object.entries(values)) {
    if (value === undefined) continue;
    if (!isColumnOf(table, column)) {
      throw new ValidationError(`Unknown column "${column}" on table ${table}`, [column]);
    }
    if (locked.includes(column)) {
      throw new ValidationError(`${column} is assigned by the store and cannot be set`, [column]);
    }
    if (!isCellValue(value)) {
      throw new ValidationError(`Unsupported value for column "${column}"`, [column]);
    }
    cells[column] = blankToNull(value);
  }
  return cells;
}

function issueFields(error: z.ZodError): string[] {
  return [...new Set(error.issues.map((issue) => String(issue.path[0])))];
}

function botValidationError(error: z.ZodError): ValidationError {
  const fields = issueFields(error);
  const missing = fields.filter((field) => REQUIRED_FIELD_SET.has(field));
  if (missing.length > 0) {
    return new ValidationError(`Please fill out all required fields: ${missing.join(", ")}`, missing);
  }
  return new ValidationError(`Invalid value for ${fields.join(", ")}`, fields);
}

function entryValidationError(error: z.ZodError): ValidationError {
  const fields = issueFields(error);
  return new ValidationError(`Invalid value for ${fields.join(", ")}`, fields);
}

function parseNewBot(values: RecordValues): NewBot {
  const result = newBotSchema.safeParse(values);
  if (!result.success) throw botValidationError(result.error);
  return result.data;
}

function parseNewKnowledgeEntry(values: RecordValues): NewKnowledgeEntry {
  const result = newKnowledgeEntrySchema.safeParse(values);
  if (!result.success) throw entryValidationError(result.error);
  return result.data;
}

/** Updates carry only the changed columns; each one is held to the insert rules. */
const botUpdateSchema = newBotSchema.partial();
const entryUpdateSchema = newKnowledgeEntrySchema.partial();

function parseBotUpdate(values: RecordValues): z.infer<typeof botUpdateSchema> {
  const result = botUpdateSchema.safeParse(values);
  if (!result.success) throw botValidationError(result.error);
  return result.data;
}

function parseEntryUpdate(values: RecordValues): z.infer<typeof entryUpdateSchema> {
  const result = entryUpdateSchema.safeParse(values);
  if (!result.success) throw entryValidationError(result.error);
  return result.data;
}

function readOnlyLinks(): ValidationError {
  return new ValidationError("BotKnowledgeLink is view-only; edit links through a bot", ["table"]);
}

/**
 * The operator flows of the admin console. Every method reports a plain
 * OperationStatus instead of throwing.
 */
export class ConsoleService {
  private readonly entities: EntityRepository;
  private readonly links: LinkSynchronizer;
  private readonly botOwner: string;
  private readonly now: () => Date;

  constructor(options: ConsoleServiceOptions) {
    this.entities = options.entities;
    this.links = options.links;
    this.botOwner = options.botOwner;
    this.now = options.now ?? (() => new Date());
  }

  async viewTable(tableName: string, request: ViewRequest = {}): Promise<OperationStatus<{ view: TableView }>> {
    try {
      const table = assertTableName(tableName);
      const rows = await this.readRows(table);
      return success(`${rows.length} row(s)`, { view: applyView(table, rows, request) });
    } catch (err) {
      return failure(err);
    }
  }

  async knowledgeOptions(): Promise<OperationStatus<{ options: KnowledgeOption[] }>> {
    try {
      const entries = await this.entities.readAll("KnowledgeBase");
      const options = entries.map(({ ID, Content }) => ({ ID, Content }));
      return success(`${options.length} knowledge entries`, { options });
    } catch (err) {
      return failure(err);
    }
  }

  async linkedKnowledge(botId: number): Promise<OperationStatus<{ botId: number; knowledgeIds: number[] }>> {
    try {
      const knowledgeIds = await this.links.listLinkedKnowledge(botId);
      return success(`${knowledgeIds.length} linked knowledge entries`, { botId, knowledgeIds });
    } catch (err) {
      return failure(err);
    }
  }

  /**
   * Validate, fill defaults, insert, then link the selected knowledge entries.
   * Nothing is written unless the bot and every knowledge ID are valid. If the
   * store refuses a link after the insert, the bot stays and its ID is returned
   * with the failure.
   */
  async addBot(
    values: RecordValues,
    knowledgeIds: readonly number[] = [],
  ): Promise<OperationStatus<{ botId: number; linked: number }> | PartialFailure<{ botId: number }>> {
    let botId: number;
    let keys: number[];
    try {
      keys = parseKnowledgeKeys(knowledgeIds);
      const cells = cellsFor("Bots", values, ["Bot_ID"]);
      const bot = parseNewBot(withDefaults(botDefaults({ owner: this.botOwner, now: this.now() }), cells));
      botId = await this.entities.insert("Bots", bot);
    } catch (err) {
      return failure(err);
    }

    try {
      const linked = keys.length > 0 ? await this.links.linkIfAbsent(botId, keys) : 0;
      const message = keys.length > 0 ? "Bot added successfully and linked to KnowledgeBase" : "Bot added successfully";
      return success(message, { botId, linked });
    } catch (err) {
      logger.warn(`Console: bot ${botId} added but linking failed`, { knowledgeIds: keys });
      return partialFailure(err, { botId });
    }
  }

  async addKnowledgeEntry(values: RecordValues): Promise<OperationStatus<{ id: number }>> {
    try {
      const cells = cellsFor("KnowledgeBase", values, []);
      const entry = parseNewKnowledgeEntry(withDefaults(knowledgeEntryDefaults(), cells));
      const id = await this.entities.insert("KnowledgeBase", entry);
      return success("Record added successfully", { id });
    } catch (err) {
      return failure(err);
    }
  }

  /** Route an add to the table's own flow. */
  async addRecord(
    tableName: string,
    values: RecordValues,
    knowledgeIds: readonly number[] = [],
  ): Promise<OperationStatus<{ id: number; linked: number }> | PartialFailure<{ botId: number }>> {
    try {
      const table = assertTableName(tableName);
      switch (table) {
        case "Bots": {
          const status = await this.addBot(values, knowledgeIds);
          return status.ok ? success(status.message, { id: status.botId, linked: status.linked }) : status;
        }
        case "KnowledgeBase": {
          const status = await this.addKnowledgeEntry(values);
          return status.ok ? success(status.message, { id: status.id, linked: 0 }) : status;
        }
        case "BotKnowledgeLink":
          throw readOnlyLinks();
      }
    } catch (err) {
      return failure(err);
    }
  }

  /**
   * Update the record picked by the table's identifier column. For a bot,
   * `knowledgeIds` (when given) becomes its complete link set.
   */
  async updateRecord(
    tableName: string,
    identifier: string,
    values: RecordValues,
    knowledgeIds?: readonly number[],
  ): Promise<OperationStatus<{ updated: number }>> {
    try {
      const table = assertTableName(tableName);
      switch (table) {
        case "Bots": {
          const keys = knowledgeIds === undefined ? undefined : parseKnowledgeKeys(knowledgeIds);
          const cells = parseBotUpdate(cellsFor("Bots", values, ["Bot_ID"]));
          const botId = await this.findBotId(identifier);
          const updated = await this.entities.updateByKey("Bots", "Bot_ID", botId, cells);
          if (keys !== undefined) {
            await this.links.replaceLinks(botId, keys);
          }
          return success("Record updated successfully", { updated });
        }
        case "KnowledgeBase": {
          const id = parseRowKey(identifier, IDENTIFIER_COLUMNS.KnowledgeBase);
          const cells = parseEntryUpdate(cellsFor("KnowledgeBase", values, ["ID"]));
          const updated = await this.entities.updateByKey("KnowledgeBase", IDENTIFIER_COLUMNS.KnowledgeBase, id, cells);
          if (updated === 0) throw new NotFoundError(`No KnowledgeBase row with ID ${id}`);
          return success("Record updated successfully", { updated });
        }
        case "BotKnowledgeLink":
          throw readOnlyLinks();
      }
    } catch (err) {
      return failure(err);
    }
  }

  /** Delete the record picked by the table's identifier column, links first. */
  async deleteRecord(tableName: string, identifier: string): Promise<OperationStatus<{ deleted: number }>> {
    try {
      const table = assertTableName(tableName);
      const deleted = await this.deleteByIdentifier(table, identifier);
      if (deleted === 0) {
        throw new NotFoundError(`No ${table} row with ${IDENTIFIER_COLUMNS[table]} ${identifier}`);
      }
      logger.info(`Console: deleted ${table} ${identifier}`, { deleted });
      return success("Record deleted successfully", { deleted });
    } catch (err) {
      return failure(err);
    }
  }

  private async deleteByIdentifier(table: TableName, identifier: string): Promise<number> {
    switch (table) {
      case "Bots":
        return this.entities.deleteByKey("Bots", IDENTIFIER_COLUMNS.Bots, identifier);
      case "KnowledgeBase":
        return this.entities.deleteByKey(
          "KnowledgeBase",
          IDENTIFIER_COLUMNS.KnowledgeBase,
          parseRowKey(identifier, IDENTIFIER_COLUMNS.KnowledgeBase),
        );
      case "BotKnowledgeLink":
        // Deleting from the join table by Bot_ID clears that bot's links.
        return this.links.cascadeDeleteForBot(parseRowKey(identifier, IDENTIFIER_COLUMNS.BotKnowledgeLink));
    }
  }

  private async findBotId(name: string): Promise<number> {
    const bots = await this.entities.readAll("Bots");
    const bot = bots.find((row) => row.Botperson_Name === name);
    if (!bot) throw new NotFoundError(`No bot named "${name}"`);
    return bot.Bot_ID;
  }

  private async readRows(table: TableName): Promise<ViewRow[]> {
    switch (table) {
      case "Bots":
        return this.entities.readAll("Bots");
      case "KnowledgeBase":
        return this.entities.readAll("KnowledgeBase");
      case "BotKnowledgeLink":
        return this.entities.readAll("BotKnowledgeLink");
    }
  }
}
