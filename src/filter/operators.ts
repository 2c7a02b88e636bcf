/** Operator tags that appear as `"<TAG>_<id>"` node labels in plan output. */
export const OPERATOR_TAGS = [
  "CONDITION",
  "COPY",
  "DEPENDENCY_COLLECTION",
  "DDL",
  "EXPLAIN",
  "FETCH",
  "FIL",
  "FS",
  "FUNCTION",
  "GBY",
  "HASHTABLEDUMMY",
  "HASHTABLESINK",
  "JOIN",
  "LATERALVIEWFORWARD",
  "LIM",
  "LVJ",
  "MAP",
  "MAPJOIN",
  "MAPRED",
  "MAPREDLOCAL",
  "MOVE",
  "OP",
  "RS",
  "SCR",
  "SEL",
  "STATS",
  "TS",
  "UDTF",
  "UNION",
] as const;
