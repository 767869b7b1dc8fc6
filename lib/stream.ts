import { z } from "zod";
import { AnalysisBundleSchema } from "./export";
import type { AnalysisBundle, PipelineStep, ProgressStatus } from "./types";

export type AnalysisEvent =
  | { type: "progress"; step: PipelineStep; status: ProgressStatus }
  | { type: "result"; bundle: AnalysisBundle }
  | { type: "error"; error: string; message: string };

const AnalysisEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("progress"),
    step: z.enum(["discovery", "features", "strategy", "chart"]),
    status: z.enum(["started", "completed"]),
  }),
  z.object({ type: z.literal("result"), bundle: AnalysisBundleSchema }),
  z.object({ type: z.literal("error"), error: z.string(), message: z.string() }),
]) satisfies z.ZodType<AnalysisEvent>;

export const NDJSON_CONTENT_TYPE = "application/x-ndjson; charset=utf-8";

export function encodeEvent(event: AnalysisEvent): string {
  return JSON.stringify(event) + "\n";
}

export function decodeEvent(line: string): AnalysisEvent {
  const parsed = AnalysisEventSchema.safeParse(JSON.parse(line));
  if (!parsed.success) {
    throw new Error(`Unexpected event from the analysis stream: ${line.slice(0, 120)}`);
  }
  return parsed.data;
}

/** Reads newline-delimited events, buffering lines split across chunks. */
export async function readEvents(
  body: ReadableStream<Uint8Array>,
  onEvent: (event: AnalysisEvent) => void
): Promise<void> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";

      for (const line of lines) {
        if (line.trim()) onEvent(decodeEvent(line));
      }
    }
  } catch (error) {
    await reader.cancel().catch((cancelError: unknown) => {
      console.warn("Could not cancel the analysis stream:", cancelError);
    });
    throw error;
  } finally {
    reader.releaseLock();
  }

  buffer += decoder.decode();
  if (buffer.trim()) onEvent(decodeEvent(buffer));
}
