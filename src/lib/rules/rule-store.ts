import Database from "better-sqlite3";
import { existsSync, mkdirSync } from "fs";
import path from "path";
import { z } from "zod";
import { config } from "../config";

export const LearnedRuleSchema = z.object({
  domain: z.string().min(1),
  /** Regex source matched against the page path */
  pathPattern: z.string().default(".*"),
  cardSelector: z.string().min(1),
  fields: z.object({
    name: z.string().min(1),
    address: z.string().optional(),
    street: z.string().optional(),
    cityStateZip: z.string().optional(),
    phone: z.string().optional(),
    website: z.string().optional(),
  }),
  version: z.number().int().nonnegative().default(1),
});

export type LearnedRule = z.infer<typeof LearnedRuleSchema>;
export type LearnedRuleInput = z.input<typeof LearnedRuleSchema>;

/** Read side of the learned-rule store, the only part the pipeline sees. */
export interface LearnedRuleStore {
  getRules(domain: string): LearnedRule[];
}

export function normalizeDomain(domain: string): string {
  return domain.trim().toLowerCase().replace(/^www\./, "");
}

/**
 * Learned extraction rules persisted in SQLite, one row per
 * (domain, path pattern).
 */
export class SqliteRuleStore implements LearnedRuleStore {
  private readonly db: Database.Database;

  constructor(dbPath: string = config.rulesDbPath) {
    if (dbPath === ":memory:") {
      this.db = new Database(dbPath);
    } else {
      const resolved = path.resolve(process.cwd(), dbPath);
      const dir = path.dirname(resolved);
      if (!existsSync(dir)) mkdirSync(dir, { recursive: true });
      this.db = new Database(resolved);
      this.db.pragma("journal_mode = WAL");
    }
    initSchema(this.db);
  }

  getRules(domain: string): LearnedRule[] {
    const rows = this.db
      .prepare("SELECT rule_json FROM learned_rules WHERE domain = ? ORDER BY version DESC, path_pattern")
      .all(normalizeDomain(domain));

    const rules: LearnedRule[] = [];
    for (const row of rows) {
      const rule = parseRow(row);
      if (rule) rules.push(rule);
    }
    return rules;
  }

  /**
   * Insert or replace the rule for (domain, pathPattern). An existing rule
   * with a higher version is kept. Returns whether the rule was written.
   */
  upsertRule(input: LearnedRuleInput): boolean {
    const rule = LearnedRuleSchema.parse({ ...input, domain: normalizeDomain(input.domain) });

    const existing = this.db
      .prepare("SELECT version FROM learned_rules WHERE domain = ? AND path_pattern = ?")
      .get(rule.domain, rule.pathPattern);
    const existingVersion = z.object({ version: z.number() }).safeParse(existing);
    if (existingVersion.success && existingVersion.data.version > rule.version) {
      console.log(
        `[rules] Keeping v${existingVersion.data.version} for ${rule.domain} ${rule.pathPattern} (incoming v${rule.version})`
      );
      return false;
    }

    this.db
      .prepare(
        `INSERT INTO learned_rules (domain, path_pattern, version, rule_json, updated_at)
         VALUES (?, ?, ?, ?, ?)
         ON CONFLICT(domain, path_pattern) DO UPDATE SET
           version = excluded.version,
           rule_json = excluded.rule_json,
           updated_at = excluded.updated_at`
      )
      .run(rule.domain, rule.pathPattern, rule.version, JSON.stringify(rule), new Date().toISOString());
    return true;
  }

  listDomains(): string[] {
    const rows = this.db.prepare("SELECT DISTINCT domain FROM learned_rules ORDER BY domain").all();
    const parsed = z.array(z.object({ domain: z.string() })).safeParse(rows);
    return parsed.success ? parsed.data.map((r) => r.domain) : [];
  }

  close(): void {
    this.db.close();
  }
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS learned_rules (
      domain TEXT NOT NULL,
      path_pattern TEXT NOT NULL,
      version INTEGER NOT NULL DEFAULT 1,
      rule_json TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      PRIMARY KEY (domain, path_pattern)
    );
  `);
}

function parseRow(row: unknown): LearnedRule | null {
  const shape = z.object({ rule_json: z.string() }).safeParse(row);
  if (!shape.success) return null;

  let data: unknown;
  try {
    data = JSON.parse(shape.data.rule_json);
  } catch (error) {
    console.warn("[rules] Skipping unreadable rule row:", error instanceof Error ? error.message : error);
    return null;
  }

  const rule = LearnedRuleSchema.safeParse(data);
  if (!rule.success) {
    console.warn(`[rules] Skipping invalid rule row: ${rule.error.issues[0]?.message ?? "unknown issue"}`);
    return null;
  }
  return rule.data;
}
