import { Router } from "express";
import multer from "multer";
import { TranscriptionController } from "../controllers/transcription.controller";

export interface TranscriptionRoutesOptions {
  maxUploadBytes: number;
}

export function createTranscriptionRoutes(
  transcriptionController: TranscriptionController,
  options: TranscriptionRoutesOptions
): Router {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: options.maxUploadBytes,
    },
    fileFilter: (_req, file, cb) => {
      // Accept audio and video files; ffmpeg extracts the audio track
      if (file.mimetype.startsWith("audio/") || file.mimetype.startsWith("video/")) {
        cb(null, true);
      } else {
        cb(new Error("Only audio or video files are allowed"));
      }
    },
  });

  const router = Router();

  // Must be registered before /:jobId
  router.get("/models", (req, res) => transcriptionController.listModels(req, res));

  // Submit media for transcription
  router.post("/", upload.single("file"), (req, res) => transcriptionController.submit(req, res));

  router.get("/:jobId", (req, res) => transcriptionController.getStatus(req, res));
  router.post("/:jobId/pause", (req, res) => transcriptionController.pause(req, res));
  router.post("/:jobId/resume", (req, res) => transcriptionController.resume(req, res));
  router.post("/:jobId/cancel", (req, res) => transcriptionController.cancel(req, res));

  // ?kind=subtitle|transcript, defaults to the subtitle when one was produced
  router.get("/:jobId/output", (req, res) => transcriptionController.fetchOutput(req, res));

  return router;
}
