import Anthropic from "@anthropic-ai/sdk";
import * as cheerio from "cheerio";
import { z } from "zod";
import { config } from "../../config";
import { RawRecord, StrategyTier, type StrategyDescriptor } from "../../types";
import { cleanText, composeAddress } from "../shared";

const MAX_HTML_CHARS = 40000;

let client: Anthropic | null = null;

function getClient(): Anthropic | null {
  if (!config.anthropicApiKey) return null;
  if (!client) {
    client = new Anthropic({ apiKey: config.anthropicApiKey });
  }
  return client;
}

/** Sends a prompt and returns the input of the `report_locations` tool call, or null. */
export type ToolCaller = (prompt: string) => Promise<unknown>;

export const REPORT_LOCATIONS_TOOL: Anthropic.Tool = {
  name: "report_locations",
  description:
    "Report every physical dealership location found on the page. Omit corporate offices and navigation links.",
  input_schema: {
    type: "object" as const,
    properties: {
      locations: {
        type: "array",
        items: {
          type: "object",
          properties: {
            name: { type: "string", description: "Dealership name" },
            street: { type: "string", description: "Street address including suite" },
            city: { type: "string" },
            state: { type: "string", description: "Two-letter state or province code" },
            zip: { type: "string", description: "ZIP or postal code" },
            phone: { type: ["string", "null"] },
            website: { type: ["string", "null"] },
          },
          required: ["name", "street", "city", "state"],
        },
      },
    },
    required: ["locations"],
  },
};

const optionalText = z
  .string()
  .nullish()
  .transform((v) => cleanText(v) || undefined);

const ReportedLocationSchema = z.object({
  name: z.string().min(1),
  street: z.string().min(1),
  city: z.string().min(1),
  state: z.string().transform((s) => s.trim().toUpperCase()),
  zip: optionalText,
  phone: optionalText,
  website: optionalText,
});

const ReportLocationsSchema = z.object({
  locations: z.array(z.unknown()),
});

export async function callAnthropicTool(prompt: string): Promise<unknown> {
  const anthropic = getClient();
  if (!anthropic) return null;

  const response = await anthropic.messages.create({
    model: config.llmModel,
    max_tokens: 4096,
    tools: [REPORT_LOCATIONS_TOOL],
    tool_choice: { type: "tool", name: REPORT_LOCATIONS_TOOL.name },
    messages: [{ role: "user", content: prompt }],
  });

  for (const block of response.content) {
    if (block.type === "tool_use" && block.name === REPORT_LOCATIONS_TOOL.name) {
      return block.input;
    }
  }
  return null;
}

/** Page HTML without scripts, styles and markup noise, capped for the prompt. */
export function compactHtml(html: string, maxChars = MAX_HTML_CHARS): string {
  const $ = cheerio.load(html);
  $("script, style, noscript, svg, iframe, link, meta").remove();
  $("*").each((_, el) => {
    const $el = $(el);
    for (const attr of Object.keys($el.attr() ?? {})) {
      if (attr !== "href" && attr !== "class") $el.removeAttr(attr);
    }
  });
  const body = ($("body").html() ?? $.root().html() ?? "").replace(/\s+/g, " ").trim();
  return body.slice(0, maxChars);
}

export function buildPrompt(html: string, url: string): string {
  return [
    `The HTML below is from ${url}, a car dealership group website.`,
    "Extract every real physical dealership location on the page: name, street, city, two-letter state or province code, ZIP/postal code, phone and website.",
    "Skip corporate offices, careers pages, navigation labels and anything without a street address.",
    "Report the result with the report_locations tool.",
    "",
    compactHtml(html),
  ].join("\n");
}

/**
 * Last-resort extraction through an LLM tool call. Disabled without an API key
 * unless a tool caller is injected.
 */
export class LlmExtractionStrategy implements StrategyDescriptor {
  readonly name = "llm-extraction";
  readonly tier = StrategyTier.FALLBACK;

  private readonly callTool: ToolCaller;
  private readonly enabled: boolean;

  constructor(options: { callTool?: ToolCaller; enabled?: boolean } = {}) {
    this.callTool = options.callTool ?? callAnthropicTool;
    this.enabled =
      options.enabled ??
      (config.enableLlmFallback && (options.callTool !== undefined || config.anthropicApiKey !== ""));
  }

  canHandle(html: string): boolean {
    if (!this.enabled) return false;
    return cleanText(cheerio.load(html)("body").text()).length > 0;
  }

  async extract(html: string, url: string): Promise<RawRecord[]> {
    console.log(`[llm] Asking ${config.llmModel} to extract locations from ${url}`);
    const input = await this.callTool(buildPrompt(html, url));

    const report = ReportLocationsSchema.safeParse(input);
    if (!report.success) {
      console.warn(`[llm] No usable report_locations call for ${url}`);
      return [];
    }

    const records: RawRecord[] = [];
    for (const item of report.data.locations) {
      const parsed = ReportedLocationSchema.safeParse(item);
      if (!parsed.success) continue;
      const loc = parsed.data;
      if (!/^[A-Z]{2}$/.test(loc.state)) continue;

      records.push({
        name: cleanText(loc.name),
        rawAddress: composeAddress({
          street: loc.street,
          city: loc.city,
          region: loc.state,
          postalCode: loc.zip && /^(?:\d{5}(?:-\d{4})?|[A-Z]\d[A-Z] ?\d[A-Z]\d)$/i.test(loc.zip) ? loc.zip : undefined,
        }),
        phone: loc.phone && loc.phone.replace(/\D/g, "").length >= 10 ? loc.phone : undefined,
        website: loc.website,
        sourceUrl: url,
        strategyName: this.name,
      });
    }

    console.log(`[llm] Model reported ${records.length} usable locations for ${url}`);
    return records;
  }
}
