import { describe, expect, it } from "vitest";
import {
  RegexFilterSet,
  buildQFileFilterSet,
  createFilterContext,
  currentUserName,
  escapeRegExp,
  type FilterContext,
} from "../src/filter/regexFilterSet.js";

const context: FilterContext = {
  rootDir: "/work/hive",
  scratchDir: "/tmp/hive-scratch",
  warehouseDir: "/work/hive/warehouse",
  expectedDir: "/work/hive/ql/results",
  outputDir: "/work/hive/itests/out",
  qFileDir: "/work/hive/ql/queries",
  timePrefix: "1700",
  userName: "qtester",
};

function filter(text: string, overrides: Partial<FilterContext> = {}): string {
  return buildQFileFilterSet({ ...context, ...overrides }).filter(text);
}

function count(haystack: string, needle: string): number {
  return haystack.split(needle).length - 1;
}

describe("RegexFilterSet", () => {
  it("feeds each rule the output of the previous one", () => {
    const set = new RegexFilterSet().addFilter("a", "b").addFilter("b", "c");
    expect(set.filter("a-b")).toBe("c-c");
  });

  it("replaces every occurrence, not just the first", () => {
    const set = new RegexFilterSet().addFilter(/x/, "y");
    expect(set.filter("x x x")).toBe("y y y");
    expect(set.getRules()[0].pattern.flags).toContain("g");
  });

  it("matches literal filters verbatim, including regex metacharacters", () => {
    const set = new RegexFilterSet().addLiteralFilter("/work/hive+(1)", "ROOT");
    expect(set.filter("/work/hive+(1)/t and /work/hiveee(1)")).toBe("ROOT/t and /work/hiveee(1)");
    expect(escapeRegExp("a.b*c")).toBe("a\\.b\\*c");
  });

  it("skips a literal filter built from an empty value", () => {
    const set = new RegexFilterSet().addLiteralFilter("", "EMPTY");
    expect(set.getRules()).toHaveLength(0);
    expect(set.filter("abc")).toBe("abc");
  });
});

describe("buildQFileFilterSet", () => {
  it("strips structured log headers", () => {
    expect(filter("2024-03-05T10:11:12,345 INFO [main] ql.Driver: Compiling command\n")).toBe(
      "Compiling command\n",
    );
  });

  it("removes operation log banner lines", () => {
    const input =
      "going to print operations logs\nOK\nprinted operations logs\n" +
      "Getting log thread is interrupted, since query is done!\nDone\n";
    expect(filter(input)).toBe("OK\nDone\n");
  });

  it("masks scratch paths including their trailing segments", () => {
    expect(filter("path /tmp/hive-scratch/qtester/abc-123/_tmp end")).toBe(
      "path !!{hive.exec.scratchdir}!! end",
    );
  });

  it("masks each configured directory with its own placeholder", () => {
    const input = [
      "/work/hive/warehouse/t1",
      "/work/hive/ql/results/a.q.out",
      "/work/hive/itests/out/a.q.raw",
      "/work/hive/ql/queries/a.q",
      "/work/hive/data/files/kv1.txt",
    ].join("\n");
    expect(filter(input)).toBe(
      [
        "!!{hive.metastore.warehouse.dir}!!/t1",
        "!!{expectedDirectory}!!/a.q.out",
        "!!{outputDirectory}!!/a.q.raw",
        "!!{qFileDirectory}!!/a.q",
        "!!{hive.root}!!/data/files/kv1.txt",
      ].join("\n"),
    );
  });

  it("elides query ids, URIs and last_modified_by values", () => {
    expect(filter("done (queryId=qtester_20240101_abc)")).toBe("done queryId=(!!{queryId}!!)");
    expect(filter("location file:/user/warehouse/t1 and pfile:/other/p and hdfs:/nn/path")).toBe(
      "location file:/!!ELIDED!! and pfile:/!!ELIDED!! and hdfs:/!!ELIDED!!",
    );
    expect(filter("last_modified_by=qtester")).toBe("last_modified_by=!!ELIDED!!");
  });

  it("masks calendar timestamps", () => {
    expect(filter("created Tue Mar 05 10:11:12 UTC 2024 ok")).toBe("created !!TIMESTAMP!! ok");
    expect(filter("created Tue Mar 05 10:11:12 UTC 1999 ok")).toBe(
      "created Tue Mar 05 10:11:12 UTC 1999 ok",
    );
  });

  it("masks epoch seconds and millis that start with the run's time prefix", () => {
    expect(filter("transient_lastDdlTime 1700123456\n")).toBe("transient_lastDdlTime !!UNIXTIME!!\n");
    expect(filter("at 1700123456789,")).toBe("at !!UNIXTIMEMILLIS!!,");
  });

  it("leaves numbers with another prefix, another length or no leading boundary alone", () => {
    expect(filter(" 1699123456 ")).toBe(" 1699123456 ");
    expect(filter(" 17001234567 ")).toBe(" 17001234567 ");
    expect(filter("1700123456 x")).toBe("1700123456 x");
  });

  it("masks the invoking user", () => {
    expect(filter("owner qtester")).toBe("owner !!{user.name}!!");
  });

  it("elides numeric suffixes of known operator labels only", () => {
    expect(filter('"TS_0" "SEL_12" "MAPJOIN_7" "UNKNOWN_3"')).toBe(
      '"TS_!!ELIDED!!" "SEL_!!ELIDED!!" "MAPJOIN_!!ELIDED!!" "UNKNOWN_3"',
    );
  });

  it("elides elapsed time lines", () => {
    expect(filter("Time taken: 3.215 seconds\nTime taken: 12 seconds\n")).toBe(
      "Time taken: !!ELIDED!! seconds\nTime taken: !!ELIDED!! seconds\n",
    );
  });

  it("masks directories before the epoch rules can match inside them", () => {
    const output = filter("stored at /data/wh-1700123456/warehouse/t1\n", {
      warehouseDir: "/data/wh-1700123456/warehouse",
    });
    expect(output).toBe("stored at !!{hive.metastore.warehouse.dir}!!/t1\n");
    expect(output).not.toContain("UNIXTIME");
  });

  it("replaces N occurrences with N placeholders and is idempotent", () => {
    const input =
      "Time taken: 1.5 seconds\n" +
      "ts 1700000001 owner qtester\n" +
      "Time taken: 0.25 seconds\n" +
      "(queryId=q1) Mon Jan 01 00:00:00 PST 2024 /work/hive/warehouse/t\n" +
      "Time taken: 9 seconds\n";
    const once = filter(input);

    expect(count(once, "Time taken: !!ELIDED!! seconds")).toBe(3);
    expect(once).not.toMatch(/Time taken: [0-9.]+ seconds/);
    expect(count(once, "!!UNIXTIME!!")).toBe(1);
    expect(count(once, "!!{user.name}!!")).toBe(1);
    expect(filter(once)).toBe(once);
  });

  it("returns a fresh rule set on every call", () => {
    const first = buildQFileFilterSet(context);
    const second = buildQFileFilterSet({ ...context, timePrefix: "1800" });
    expect(first).not.toBe(second);
    expect(first.filter(" 1700123456 ")).toBe(" !!UNIXTIME!! ");
    expect(second.filter(" 1700123456 ")).toBe(" 1700123456 ");
  });
});

describe("createFilterContext", () => {
  const directories = {
    rootDir: "/r",
    scratchDir: "/s",
    warehouseDir: "/w",
    expectedDir: "/e",
    outputDir: "/o",
    qFileDir: "/q",
  };

  it("takes the time prefix and user from the injected values", () => {
    const built = createFilterContext(directories, {
      now: () => new Date(1712345678901),
      userName: "qtester",
    });
    expect(built).toEqual({ ...directories, timePrefix: "1712", userName: "qtester" });
  });

  it("defaults to the current user", () => {
    expect(createFilterContext(directories).userName).toBe(currentUserName());
  });
});
