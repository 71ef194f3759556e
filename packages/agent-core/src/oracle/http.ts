import { z } from "zod";
import { toJsonSafe } from "../utils/json.js";
import type { AgentSnapshot, Decision, DecisionOracle } from "./decision.js";

const decisionSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("none"), reason: z.string().default("no action") }),
  z.object({
    action: z.literal("call"),
    functionName: z.string().min(1),
    params: z.record(z.union([z.string(), z.number(), z.boolean()])).default({}),
    reason: z.string().optional()
  })
]);

export class HttpDecisionOracle implements DecisionOracle {
  constructor(
    private readonly url: string,
    private readonly fetcher: typeof fetch = fetch
  ) {}

  async decide(snapshot: AgentSnapshot, signal?: AbortSignal): Promise<Decision> {
    const response = await this.fetcher(this.url, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(toJsonSafe(snapshot)),
      signal
    });

    if (!response.ok) {
      const message = await response.text();
      throw new Error(`Decision oracle request failed (${response.status}): ${message}`);
    }

    const parsed = decisionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Decision oracle returned an invalid decision: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    return parsed.data;
  }
}
