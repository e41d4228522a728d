import express from "express";
import type { NextFunction, Request, Response } from "express";
import type { ServiceConfig } from "./config";
import { normalize } from "./modules/textnorm/normalize";
import { expandNumbers } from "./modules/textnorm/numbers";
import { preprocessForTts } from "./modules/textnorm/pipeline";
import { validateVietnameseText } from "./modules/textnorm/validate";
import type { WordSegmentation } from "./modules/segmenter/segmentation";
import { prepareSynthesisRequest } from "./modules/synthesis/options";
import { errorMessage, log } from "./util/log";
import { createTrace, msSinceStart } from "./util/trace";

export interface AppDeps {
  config: ServiceConfig;
  segmentation: WordSegmentation;
}

type Fields = Record<string, unknown>;

const isRecord = (value: unknown): value is Fields =>
  typeof value === "object" && value !== null && !Array.isArray(value);

// express 4 does not forward rejected promises to the error handler on its own.
const route =
  (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction) => {
    fn(req, res).catch(next);
  };

const isBodyParserError = (err: unknown, type: string): boolean =>
  isRecord(err) && err.type === type;

export const createApp = ({ config, segmentation }: AppDeps) => {
  const app = express();

  app.use((req, res, next) => {
    const trace = createTrace(req.header("x-trace-id"));
    res.setHeader("x-trace-id", trace.traceId);
    res.on("finish", () => {
      log.info("request handled", {
        traceId: trace.traceId,
        method: req.method,
        route: req.path,
        status: res.statusCode,
        ms: msSinceStart(trace),
      });
    });
    next();
  });

  // Leave headroom over maxTextChars: Vietnamese letters take 2-3 bytes in UTF-8.
  app.use(express.json({ limit: config.maxTextChars * 4 + 4096 }));

  /** Pulls `text` out of the body, or answers 400/413 and returns null. */
  const readText = (req: Request, res: Response): { text: string; fields: Fields } | null => {
    const body: unknown = req.body;
    const fields = isRecord(body) ? body : {};
    const text = fields.text;
    if (typeof text !== "string") {
      res.status(400).json({ error: "text must be a string" });
      return null;
    }
    if (Array.from(text).length > config.maxTextChars) {
      res.status(413).json({ error: "text too long", maxTextChars: config.maxTextChars });
      return null;
    }
    return { text, fields };
  };

  app.get("/healthz", (_req, res) => {
    res.json({
      ok: true,
      segmenter: { available: segmentation.available },
      maxTextChars: config.maxTextChars,
    });
  });

  app.post("/v1/normalize", (req, res) => {
    const input = readText(req, res);
    if (!input) return;
    const expandAbbreviations = input.fields.expandAbbreviations !== false;
    res.json({ text: normalize(input.text, { expandAbbreviations }) });
  });

  app.post("/v1/expand-numbers", (req, res) => {
    const input = readText(req, res);
    if (!input) return;
    res.json({ text: expandNumbers(input.text) });
  });

  app.post(
    "/v1/preprocess",
    route(async (req, res) => {
      const input = readText(req, res);
      if (!input) return;
      let text = preprocessForTts(input.text);
      const segmented = input.fields.segment === true && segmentation.available;
      if (segmented) {
        text = await segmentation.segmentWords(text);
      }
      res.json({ text, valid: validateVietnameseText(input.text), segmented });
    }),
  );

  app.post(
    "/v1/segment",
    route(async (req, res) => {
      const input = readText(req, res);
      if (!input) return;
      const text = await segmentation.segmentWords(input.text);
      res.json({ text, segmented: segmentation.available });
    }),
  );

  app.post("/v1/validate", (req, res) => {
    const input = readText(req, res);
    if (!input) return;
    res.json({ valid: validateVietnameseText(input.text) });
  });

  app.post("/v1/synthesis-request", (req, res) => {
    const input = readText(req, res);
    if (!input) return;
    const prepared = prepareSynthesisRequest(input.text, input.fields);
    if (!prepared.ok) {
      res.status(400).json({ error: "invalid synthesis options", details: prepared.errors });
      return;
    }
    if (prepared.request.warnings.length) {
      log.warn("synthesis options outside recommended range", { warnings: prepared.request.warnings });
    }
    res.json(prepared.request);
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err, "entity.parse.failed")) {
      res.status(400).json({ error: "invalid json" });
      return;
    }
    if (isBodyParserError(err, "entity.too.large")) {
      res.status(413).json({ error: "text too long", maxTextChars: config.maxTextChars });
      return;
    }
    log.error("unhandled request error", { error: errorMessage(err) });
    res.status(500).json({ error: "internal error" });
  });

  return app;
};
