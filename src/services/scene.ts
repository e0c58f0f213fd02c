/**
 * Scene analysis prompts and answer parsing for vision queries
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { OrchestratorError } from "../shared/errors.js";
import type { AskResult } from "./answer-stream.js";

export type SceneMode = "describe" | "read" | "find";

export type SceneAnalysis =
  | {
      ok: true;
      mode: SceneMode;
      summary: string;
      objects: string[];
      visibleText: string | null;
      /** Only for mode "find" */
      found: boolean | null;
      cached: boolean;
      raw: string;
    }
  | {
      ok: false;
      mode: SceneMode;
      status: "failed" | "cancelled" | "rejected";
      error: OrchestratorError | null;
    };

interface ParsedScene {
  summary: string;
  objects: string[];
  visibleText: string | null;
  found: boolean | null;
}

/** Structured output requested from the vision model */
export const SceneAnswerSchema = Type.Object({
  summary: Type.String({ description: "One or two sentences about the scene" }),
  objects: Type.Array(Type.String(), { description: "Notable objects, most prominent first" }),
  text: Type.String({ description: 'Visible text, "" when none' }),
  found: Type.Optional(Type.Boolean({ description: "Whether the searched object is visible" })),
});

export type SceneAnswer = Static<typeof SceneAnswerSchema>;

const JSON_SHAPE = `Reply with JSON only: {"summary": string, "objects": string[], "text": string}.`;

export function scenePrompt(mode: SceneMode, target?: string): string {
  switch (mode) {
    case "describe":
      return `Describe this scene briefly for someone wearing smart glasses. ${JSON_SHAPE} Use "" for text when none is visible.`;
    case "read":
      return `Read all visible text in this image exactly as written. ${JSON_SHAPE} Put the text you read in "text".`;
    case "find":
      return (
        `Is there a ${target ?? "object"} in this image, and where? ` +
        `Reply with JSON only: {"summary": string, "objects": string[], "text": string, "found": boolean}.`
      );
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function fromAnswer(answer: SceneAnswer, mode: SceneMode, target?: string): ParsedScene {
  let found = answer.found ?? null;
  if (mode === "find" && found === null && target) {
    const wanted = target.toLowerCase();
    found = answer.objects.some((o) => o.toLowerCase().includes(wanted));
  }
  const text = answer.text.trim();
  return { summary: answer.summary.trim(), objects: answer.objects, visibleText: text || null, found };
}

/**
 * Parse a vision answer. Answers matching SceneAnswerSchema are taken as is;
 * otherwise the first {...} block is read field by field and anything
 * else becomes the summary. In mode "find" without an explicit `found`,
 * the listed objects decide.
 */
export function parseSceneAnswer(raw: string, mode: SceneMode, target?: string): ParsedScene {
  const fallback: ParsedScene = {
    summary: raw.trim(),
    objects: [],
    visibleText: null,
    found: null,
  };

  const start = raw.indexOf("{");
  const end = raw.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return fallback;
  }

  let data: unknown;
  try {
    data = JSON.parse(raw.slice(start, end + 1));
  } catch {
    return fallback;
  }
  if (Value.Check(SceneAnswerSchema, data)) {
    return fromAnswer(data, mode, target);
  }
  if (!isRecord(data)) {
    return fallback;
  }

  // Partial or loosely typed answer: keep what fits
  return fromAnswer(
    {
      summary: typeof data.summary === "string" ? data.summary : raw,
      objects: Array.isArray(data.objects) ? data.objects.filter((o): o is string => typeof o === "string") : [],
      text: typeof data.text === "string" ? data.text : "",
      found: typeof data.found === "boolean" ? data.found : undefined,
    },
    mode,
    target
  );
}

export function toSceneAnalysis(mode: SceneMode, result: AskResult, target?: string): SceneAnalysis {
  switch (result.status) {
    case "completed": {
      const parsed = parseSceneAnswer(result.text, mode, target);
      return { ok: true, mode, ...parsed, cached: result.cached, raw: result.text };
    }
    case "cancelled":
      return { ok: false, mode, status: "cancelled", error: null };
    case "failed":
    case "rejected":
      return { ok: false, mode, status: result.status, error: result.error };
  }
}
