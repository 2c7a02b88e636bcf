import { userInfo } from "node:os";
import { OPERATOR_TAGS } from "./operators.js";

export interface FilterRule {
  pattern: RegExp;
  replacement: string;
}

/**
 * Ordered pattern/replacement pipeline. Each rule runs over the output of
 * the rules registered before it.
 */
export class RegexFilterSet {
  private readonly rules: FilterRule[] = [];

  addFilter(pattern: string | RegExp, replacement: string): this {
    const source = typeof pattern === "string" ? pattern : pattern.source;
    const flags = typeof pattern === "string" ? "g" : withGlobalFlag(pattern.flags);
    this.rules.push({ pattern: new RegExp(source, flags), replacement });
    return this;
  }

  addLiteralFilter(literal: string, replacement: string, suffixPattern = ""): this {
    if (literal.length === 0) {
      return this;
    }
    return this.addFilter(escapeRegExp(literal) + suffixPattern, replacement);
  }

  filter(input: string): string {
    let output = input;
    for (const rule of this.rules) {
      output = output.replace(rule.pattern, rule.replacement);
    }
    return output;
  }

  getRules(): readonly FilterRule[] {
    return this.rules;
  }
}

function withGlobalFlag(flags: string): string {
  return flags.includes("g") ? flags : `${flags}g`;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export interface FilterDirectories {
  scratchDir: string;
  warehouseDir: string;
  expectedDir: string;
  outputDir: string;
  qFileDir: string;
  rootDir: string;
}

/** Run-scoped values the filter set is built from. */
export interface FilterContext extends FilterDirectories {
  /** Leading four digits of the current epoch time in milliseconds. */
  timePrefix: string;
  userName: string;
}

export interface FilterContextOverrides {
  now?: () => Date;
  userName?: string;
}

export function createFilterContext(
  directories: FilterDirectories,
  overrides: FilterContextOverrides = {},
): FilterContext {
  const now = overrides.now ?? (() => new Date());
  return {
    ...directories,
    timePrefix: String(now().getTime()).slice(0, 4),
    userName: overrides.userName ?? currentUserName(),
  };
}

/** `userInfo()` throws when the uid has no passwd entry, as in many containers. */
export function currentUserName(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? "";
  }
}

const LOG_HEADER_PATTERN =
  "\\d{4}-\\d{2}-\\d{2}T\\d{2}:\\d{2}:\\d{2},\\d*\\s+\\S+\\s+\\[.*\\]\\s+\\S+:\\s+";

const CALENDAR_TIME_PATTERN =
  "(Mon|Tue|Wed|Thu|Fri|Sat|Sun) " +
  "(Jan|Feb|Mar|Apr|May|Jun|Jul|Aug|Sep|Oct|Nov|Dec) " +
  "\\d{2} \\d{2}:\\d{2}:\\d{2} \\w+ 20\\d{2}";

const OPERATOR_LABEL_PATTERN = `"(${OPERATOR_TAGS.join("|")})_\\d+"`;

const LOG_BANNER_LINES = [
  "going to print operations logs\n",
  "printed operations logs\n",
  "Getting log thread is interrupted, since query is done!\n",
];

/**
 * Builds the transcript masking rules for one run. The order is load-bearing:
 * directory paths are masked before the numeric time rules can see them.
 */
export function buildQFileFilterSet(context: FilterContext): RegexFilterSet {
  const { timePrefix } = context;
  const filterSet = new RegexFilterSet().addFilter(LOG_HEADER_PATTERN, "");

  for (const line of LOG_BANNER_LINES) {
    filterSet.addLiteralFilter(line, "");
  }

  filterSet
    .addLiteralFilter(context.scratchDir, "!!{hive.exec.scratchdir}!!", "[\\w\\-/]+")
    .addLiteralFilter(context.warehouseDir, "!!{hive.metastore.warehouse.dir}!!")
    .addLiteralFilter(context.expectedDir, "!!{expectedDirectory}!!")
    .addLiteralFilter(context.outputDir, "!!{outputDirectory}!!")
    .addLiteralFilter(context.qFileDir, "!!{qFileDirectory}!!")
    .addLiteralFilter(context.rootDir, "!!{hive.root}!!")
    .addFilter("\\(queryId=[^\\)]*\\)", "queryId=(!!{queryId}!!)")
    .addFilter("file:/\\w\\S+", "file:/!!ELIDED!!")
    .addFilter("pfile:/\\w\\S+", "pfile:/!!ELIDED!!")
    .addFilter("hdfs:/\\w\\S+", "hdfs:/!!ELIDED!!")
    .addFilter("last_modified_by=\\w+", "last_modified_by=!!ELIDED!!")
    .addFilter(CALENDAR_TIME_PATTERN, "!!TIMESTAMP!!")
    .addFilter(`(\\D)${timePrefix}\\d{6}(\\D)`, "$1!!UNIXTIME!!$2")
    .addFilter(`(\\D)${timePrefix}\\d{9}(\\D)`, "$1!!UNIXTIMEMILLIS!!$2")
    .addLiteralFilter(context.userName, "!!{user.name}!!")
    .addFilter(OPERATOR_LABEL_PATTERN, '"$1_!!ELIDED!!"')
    .addFilter("Time taken: [0-9\\.]* seconds", "Time taken: !!ELIDED!! seconds");

  return filterSet;
}
