import { ZodError } from "zod";
import { SqliteRuleStore, type LearnedRuleInput } from "../lib/rules/rule-store";

const FIELD_FLAGS: Record<string, keyof LearnedRuleInput["fields"]> = {
  "--name": "name",
  "--address": "address",
  "--street": "street",
  "--city-state-zip": "cityStateZip",
  "--phone": "phone",
  "--website": "website",
};

function main() {
  const args = process.argv.slice(2);
  let domain = "";
  let pathPattern: string | undefined;
  let cardSelector = "";
  let version: number | undefined;
  const fields: Partial<LearnedRuleInput["fields"]> = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (value === undefined) break;

    const field = FIELD_FLAGS[arg];
    if (field) {
      fields[field] = value;
    } else if (arg === "--domain") {
      domain = value;
    } else if (arg === "--path") {
      pathPattern = value;
    } else if (arg === "--card") {
      cardSelector = value;
    } else if (arg === "--version") {
      version = parseInt(value, 10);
    } else {
      continue;
    }
    i++;
  }

  if (!domain || !cardSelector || !fields.name) {
    console.error(
      "Usage: add-learned-rule --domain <host> --card <selector> --name <selector> [--path <regex>] [--address <selector> | --street <selector> --city-state-zip <selector>] [--phone <selector>] [--website <selector>] [--version N]"
    );
    process.exit(1);
  }

  const store = new SqliteRuleStore();
  try {
    const written = store.upsertRule({
      domain,
      pathPattern,
      cardSelector,
      fields: { ...fields, name: fields.name },
      version,
    });
    console.log(written ? `[rules] Saved rule for ${domain}` : `[rules] Newer rule already stored for ${domain}`);
    console.log(`[rules] Domains with rules: ${store.listDomains().join(", ")}`);
  } catch (err) {
    if (err instanceof ZodError) {
      console.error("[rules] Invalid rule:", err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "));
      process.exit(1);
    }
    throw err;
  } finally {
    store.close();
  }
}

main();
