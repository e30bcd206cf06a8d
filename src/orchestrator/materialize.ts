import { mkdirSync, writeFileSync } from "node:fs";
import { dirname, join } from "node:path";
import type { ChainResult } from "../types/contracts.js";
import type { StepUsage } from "../types/llm.js";
import { resultToString } from "../prompt/coerce.js";
import { estimateCost, tallyUsage } from "./budget.js";

function writeText(path: string, content: string): string {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, "utf-8");
  return path;
}

/** One block per result, each headed by a growing run of link emoji. */
export function formatDelimited(results: readonly ChainResult[]): string {
  return results
    .map((r, i) => `${"🔗".repeat(i + 1)} -------- Prompt Chain Result #${i + 1} -------------\n\n${resultToString(r)}\n\n`)
    .join("");
}

export function writeDelimitedFile(path: string, results: readonly ChainResult[]): string {
  const content = formatDelimited(results);
  writeText(path, content);
  return content;
}

const pad = (n: number) => String(n).padStart(2, "0");

function stamp(d: Date, dateSep: string, timeSep: string, between: string): string {
  const date = [d.getFullYear(), pad(d.getMonth() + 1), pad(d.getDate())].join(dateSep);
  const time = [pad(d.getHours()), pad(d.getMinutes()), pad(d.getSeconds())].join(timeSep);
  return `${date}${between}${time}`;
}

export function renderMarkdownLog(
  name: string,
  requests: readonly string[],
  results: readonly ChainResult[],
  usage: ReadonlyArray<StepUsage | null> = [],
  now: Date = new Date(),
): string {
  let md = `# 🪵 Log: ${name}\n\n`;
  md += `**Date:** ${stamp(now, "-", ":", " ")}\n\n`;

  if (usage.length > 0) {
    const tally = tallyUsage(usage);
    md += `**Total Cost**: $${estimateCost(tally).toFixed(6)}\n`;
    md += `**Tokens**: ${tally.promptTokens} in / ${tally.completionTokens} out\n\n`;
  }

  md += "## 🗣️ Prompts Sent\n\n";
  requests.forEach((req, i) => {
    md += `### Prompt #${i + 1}\n\`\`\`text\n${req}\n\`\`\`\n\n`;
  });

  md += "## 🤖 AI Responses\n\n";
  results.forEach((r, i) => {
    md += `### Response #${i + 1}\n`;
    md += r.kind === "structured"
      ? `\`\`\`json\n${JSON.stringify(r.value, null, 2)}\n\`\`\`\n\n`
      : `${r.text}\n\n`;
  });
  return md;
}

/** Writes `<dir>/<YYYY-MM-DD_HH-MM-SS>_<name>.md` and returns its path. */
export function writeMarkdownLog(
  dir: string,
  name: string,
  requests: readonly string[],
  results: readonly ChainResult[],
  usage: ReadonlyArray<StepUsage | null> = [],
  now: Date = new Date(),
): string {
  const file = join(dir, `${stamp(now, "-", "-", "_")}_${name}.md`);
  return writeText(file, renderMarkdownLog(name, requests, results, usage, now));
}
