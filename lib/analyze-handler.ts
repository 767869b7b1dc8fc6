import { NextResponse } from "next/server";
import { runAnalysis } from "./agents/orchestrator";
import { requireIdea } from "./agents/competitor-discovery";
import type { AnalysisContext } from "./context";
import { ConfigurationError, InvalidInputError, errorMessage, isAnalysisError } from "./errors";
import { NDJSON_CONTENT_TYPE, encodeEvent, type AnalysisEvent } from "./stream";

async function readIdea(req: Request): Promise<string> {
  let body: unknown;
  try {
    body = await req.json();
  } catch {
    throw new InvalidInputError("Request body must be JSON.");
  }

  const idea =
    typeof body === "object" && body !== null && "idea" in body ? body.idea : undefined;
  if (typeof idea !== "string") {
    throw new InvalidInputError("Missing or invalid 'idea' in request body.");
  }
  return requireIdea(idea);
}

/**
 * POST handler: rejects bad input and missing configuration up front, then
 * streams progress events followed by the bundle as NDJSON.
 */
export function createAnalyzeHandler(getContext: () => AnalysisContext) {
  return async function POST(req: Request): Promise<Response> {
    let idea: string;
    let ctx: AnalysisContext;
    try {
      idea = await readIdea(req);
      ctx = getContext();
    } catch (error) {
      if (error instanceof InvalidInputError) {
        return NextResponse.json({ error: error.code, message: error.message }, { status: 400 });
      }
      if (error instanceof ConfigurationError) {
        console.error("Configuration Error:", error.message);
        return NextResponse.json({ error: error.code, message: error.message }, { status: 500 });
      }
      throw error;
    }

    const encoder = new TextEncoder();
    const stream = new ReadableStream<Uint8Array>({
      async start(controller) {
        const send = (event: AnalysisEvent) =>
          controller.enqueue(encoder.encode(encodeEvent(event)));

        try {
          console.log("Calling Orchestrator....");
          const bundle = await runAnalysis(idea, ctx, {
            onProgress: (event) => send({ type: "progress", ...event }),
          });
          console.log("Orchestrator is done.");
          send({ type: "result", bundle });
        } catch (error) {
          console.error("API Error:", error);
          send({
            type: "error",
            error: isAnalysisError(error) ? error.code : "InternalError",
            message: errorMessage(error),
          });
        } finally {
          controller.close();
        }
      },
    });

    return new Response(stream, {
      headers: { "Content-Type": NDJSON_CONTENT_TYPE, "Cache-Control": "no-store" },
    });
  };
}
