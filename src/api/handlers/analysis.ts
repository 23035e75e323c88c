import type { Context } from "hono";
import { ANALYSIS_KINDS, type AnalysisKind } from "../../analytics/market.js";
import { DEFAULT_TOP_N, MAX_TOP_N } from "../../config/constants.js";
import { ValidationError } from "../../utils/errors.js";
import type { AppEnv } from "../middleware.js";
import { boundedInt, parseRealm, parseRegion } from "../params.js";

function parseKind(value: string | undefined): AnalysisKind {
  if (value === undefined) return "opportunities";
  const kind = ANALYSIS_KINDS.find((k) => k === value);
  if (!kind) {
    throw new ValidationError(`Invalid analysis kind "${value}". Allowed: ${ANALYSIS_KINDS.join(", ")}`);
  }
  return kind;
}

export async function getAnalysis(c: Context<AppEnv>) {
  const { analysis } = c.get("ctx");
  const region = parseRegion(c.req.param("region") ?? "");
  const realm = parseRealm(c.req.param("realm") ?? "");
  const kind = parseKind(c.req.query("kind"));
  const topN = boundedInt(c.req.query("top"), DEFAULT_TOP_N, 1, MAX_TOP_N);

  const result = await analysis.analyzeWithDetails(kind, region, realm, topN);
  return c.json({ region, realm, kind, top: topN, data: result });
}
