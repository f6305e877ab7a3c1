import { z } from "zod";
import { checkDocument, shouldBlock } from "../src/checker";
import {
  DEFAULT_CONFIG_PATH,
  loadRuleConfig,
  type ConfigLoadResult,
} from "../src/config";
import { errorMessage } from "../src/errors";
import { logger } from "../src/logger";
import { applySeverityFilter } from "../src/output";

export const config = {
  runtime: "nodejs",
};

export const MAX_CONTENT_CHARS = 800_000;

const checkRequestSchema = z.object({
  content: z.string().refine((value) => value.trim().length > 0, {
    message: "content must not be empty",
  }),
  severity: z.enum(["error", "warning", "info"]).optional(),
  failOn: z.enum(["error", "warning", "info", "none"]).optional(),
});

export class ApiError extends Error {
  status: number;

  constructor(status: number, message: string) {
    super(message);
    this.status = status;
  }
}

export type CheckHandler = (request: Request) => Promise<Response>;

export function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data, null, 2), {
    status,
    headers: {
      "content-type": "application/json; charset=utf-8",
      "cache-control": "no-store",
      "access-control-allow-origin": "*",
    },
  });
}

/**
 * Build the paste-and-check handler. The rule file is loaded per request so
 * edits to it show up without a restart.
 */
export function createCheckHandler(
  loadConfig: () => Promise<ConfigLoadResult>,
): CheckHandler {
  return async (request) => {
    if (request.method === "OPTIONS") {
      return new Response(null, {
        status: 204,
        headers: {
          "access-control-allow-origin": "*",
          "access-control-allow-methods": "POST, OPTIONS",
          "access-control-allow-headers": "content-type",
        },
      });
    }

    try {
      if (request.method !== "POST") {
        throw new ApiError(405, "Method not allowed. Use POST.");
      }

      const rawLength = Number.parseInt(request.headers.get("content-length") ?? "0", 10);
      if (Number.isFinite(rawLength) && rawLength > MAX_CONTENT_CHARS * 4) {
        throw new ApiError(413, "Request body too large.");
      }

      const payload = validatePayload(await parseJsonBody(request));
      const { config: ruleConfig, error: configError } = await loadConfig();
      const failOn = payload.failOn ?? "error";

      const [report] = applySeverityFilter(
        [checkDocument(payload.content, ruleConfig, { failOn })],
        payload.severity ?? "info",
      );

      return json({
        findings: report.findings,
        summary: report.summary,
        shouldBlock: shouldBlock([report], failOn),
        failOn,
        configError: configError?.message ?? null,
      });
    } catch (error: unknown) {
      if (error instanceof ApiError) {
        return json({ error: error.message }, error.status);
      }

      logger.error({ err: errorMessage(error) }, "check request failed");
      return json({ error: errorMessage(error) }, 500);
    }
  };
}

async function parseJsonBody(request: Request): Promise<unknown> {
  try {
    return await request.json();
  } catch {
    throw new ApiError(400, "Invalid JSON body");
  }
}

function validatePayload(raw: unknown): z.infer<typeof checkRequestSchema> {
  const parsed = checkRequestSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join(".");
    throw new ApiError(400, field ? `${field}: ${issue.message}` : issue.message);
  }

  if (parsed.data.content.length > MAX_CONTENT_CHARS) {
    throw new ApiError(
      413,
      `Content too large. Max supported size is ${MAX_CONTENT_CHARS} characters.`,
    );
  }

  return parsed.data;
}

export default createCheckHandler(() =>
  loadRuleConfig(process.env.STYLEGUIDE_CONFIG ?? DEFAULT_CONFIG_PATH),
);
