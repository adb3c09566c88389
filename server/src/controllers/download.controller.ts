import fs from "fs";
import { pipeline } from "stream/promises";
import { Request, Response } from "express";
import Joi from "joi";
import logger from "../utils/logger";
import { isPlainFilename } from "../utils/sanitizer";
import { parseByteRange } from "../utils/range";
import { FileNotFoundError, InvalidFilenameError } from "../errors";
import { StorageService } from "../services/storage.service";

// Validation schemas
const filenameSchema = Joi.string()
  .max(255)
  .custom((value: string, helpers) =>
    isPlainFilename(value) ? value : helpers.error("any.invalid"),
  )
  .required();

function sendStorageError(
  res: Response,
  error: unknown,
  action: string,
): void {
  if (error instanceof InvalidFilenameError) {
    res.status(400).json({ error: "Invalid filename" });
    return;
  }
  if (error instanceof FileNotFoundError) {
    res.status(404).json({ error: "File not found" });
    return;
  }
  logger.error(`Error in ${action} controller:`, error);
  if (!res.headersSent) {
    res.status(500).json({ error: "Internal server error" });
  }
}

function validateName(req: Request, res: Response): string | undefined {
  const { error, value } = filenameSchema.validate(req.params.name);
  if (error) {
    res.status(400).json({ error: "Invalid filename", details: error.message });
    return undefined;
  }
  return value;
}

export function createDownloadController(storage: StorageService) {
  async function listDownloads(req: Request, res: Response): Promise<void> {
    try {
      const files = await storage.list();
      res.status(200).json(files);
    } catch (error) {
      logger.error("Error in listDownloads controller:", error);
      res.status(500).json({ error: "Internal server error" });
    }
  }

  async function getDownload(req: Request, res: Response): Promise<void> {
    const name = validateName(req, res);
    if (name === undefined) return;

    try {
      const file = await storage.locate(name);
      res.download(file.path, name, (error) => {
        if (error) {
          logger.error(`Error sending ${name}:`, error);
        }
      });
    } catch (error) {
      sendStorageError(res, error, "getDownload");
    }
  }

  async function deleteDownload(req: Request, res: Response): Promise<void> {
    const name = validateName(req, res);
    if (name === undefined) return;

    try {
      await storage.remove(name);
      res.status(200).json({ deleted: name });
    } catch (error) {
      sendStorageError(res, error, "deleteDownload");
    }
  }

  /** Inline preview with single byte-range support. */
  async function streamDownload(req: Request, res: Response): Promise<void> {
    const name = validateName(req, res);
    if (name === undefined) return;

    try {
      const file = await storage.locate(name);
      const range = parseByteRange(req.headers.range, file.size);

      if (range === "unsatisfiable") {
        res
          .status(416)
          .set("Content-Range", `bytes */${file.size}`)
          .json({ error: "Range not satisfiable" });
        return;
      }

      res.type(name);
      res.set({
        "Accept-Ranges": "bytes",
        "Content-Disposition": `inline; filename*=UTF-8''${encodeURIComponent(name)}`,
      });

      if (range) {
        res.status(206).set({
          "Content-Range": `bytes ${range.start}-${range.end}/${file.size}`,
          "Content-Length": String(range.end - range.start + 1),
        });
        await pipeline(
          fs.createReadStream(file.path, { start: range.start, end: range.end }),
          res,
        );
        return;
      }

      res.status(200).set("Content-Length", String(file.size));
      await pipeline(fs.createReadStream(file.path), res);
    } catch (error) {
      sendStorageError(res, error, "streamDownload");
    }
  }

  return { listDownloads, getDownload, deleteDownload, streamDownload };
}

export type DownloadController = ReturnType<typeof createDownloadController>;
