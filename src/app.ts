import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { pipeline } from "node:stream/promises";
import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import multipart from "@fastify/multipart";
import { z } from "zod";
import { BACKENDS, MODEL_SIZES } from "./constants.js";
import { errorMessage } from "./errors.js";
import { removeQuietly } from "./utils/cleanup.js";
import type { JobStatus, TranscriptionQueue } from "./async/queue.js";

export interface AppDeps {
  queue: TranscriptionQueue;
  uploadDir: string;
  apiKey?: string;
  logger?: boolean | { level: string };
  maxUploadBytes?: number;
}

interface StatusResponse {
  status: JobStatus;
  progress: number;
  error?: string;
  filename?: string;
}

const UploadQuerySchema = z.object({
  model: z.enum(MODEL_SIZES).optional(),
  backend: z.enum(BACKENDS).optional(),
  language: z.string().min(1).optional(),
});

const PROTECTED_ROUTES = new Set(["/upload", "/status/:jobId", "/download/:jobId"]);
const DEFAULT_SRT_NAME = "transcript.srt";

function newJobId(): string {
  return crypto.randomUUID();
}

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger ?? false,
    requestTimeout: 0, // Disable request timeout for large uploads
  });

  // Browser clients on other origins upload and poll directly
  await app.register(cors, { origin: true });

  await app.register(multipart, {
    limits: { fileSize: deps.maxUploadBytes ?? 2 * 1024 * 1024 * 1024, files: 1 },
  });

  // API key check for job routes when API_KEY is configured
  app.addHook("preHandler", async (request, reply) => {
    if (!deps.apiKey || !PROTECTED_ROUTES.has(request.routeOptions.url ?? "")) return;
    const apiKey = request.headers["x-api-key"];
    if (!apiKey || apiKey !== deps.apiKey) {
      return reply.code(401).send({ error: "Unauthorized: Invalid or missing API key" });
    }
  });

  app.post("/upload", async (req, reply) => {
    const parsed = UploadQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: parsed.error.issues });
    }

    const data = await req.file();
    if (!data || !data.filename) {
      return reply.code(400).send({ error: "No file provided" });
    }

    const jobId = newJobId();
    const originalFilename = path.basename(data.filename);
    const filePath = path.join(deps.uploadDir, `${jobId}_${originalFilename}`);

    try {
      await pipeline(data.file, fs.createWriteStream(filePath));
      await deps.queue.enqueue({ jobId, filePath, originalFilename, opts: parsed.data });
    } catch (err) {
      req.log.error({ err, jobId }, "upload failed");
      await removeQuietly(filePath);
      return reply.code(500).send({ error: `Upload failed: ${errorMessage(err)}` });
    }

    req.log.info({ jobId, filename: originalFilename }, "job accepted");
    return reply.code(200).send({ jobId, status: "uploaded", message: "File uploaded successfully" });
  });

  app.get<{ Params: { jobId: string } }>("/status/:jobId", async (req, reply) => {
    const snapshot = await deps.queue.getSnapshot(req.params.jobId);
    if (!snapshot) {
      return reply.code(404).send({ error: "Job not found" });
    }
    const body: StatusResponse = { status: snapshot.status, progress: snapshot.progress };
    if (snapshot.error) body.error = snapshot.error;
    if (snapshot.status === "completed") {
      body.filename = snapshot.result?.filename ?? DEFAULT_SRT_NAME;
    }
    return reply.code(200).send(body);
  });

  app.get<{ Params: { jobId: string } }>("/download/:jobId", async (req, reply) => {
    const snapshot = await deps.queue.getSnapshot(req.params.jobId);
    if (!snapshot) {
      return reply.code(404).send({ error: "Job not found" });
    }
    if (snapshot.status !== "completed") {
      return reply.code(400).send({ error: "Job not completed yet" });
    }
    const srtPath = snapshot.result?.srtPath;
    if (!srtPath || !fs.existsSync(srtPath)) {
      return reply.code(404).send({ error: "SRT file not found" });
    }
    const filename = snapshot.result?.filename ?? DEFAULT_SRT_NAME;
    return reply
      .header("Content-Disposition", `attachment; filename="${filename}"`)
      .type("text/plain; charset=utf-8")
      .send(fs.createReadStream(srtPath));
  });

  app.get("/", async () => ({ message: "Video Transcription API", docs: "/healthz" }));

  app.get("/healthz", async () => ({ ok: true }));

  return app;
}
