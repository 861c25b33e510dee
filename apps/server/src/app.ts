import express from "express";
import type { NextFunction, Request, Response } from "express";
import { OpenDriveError, logger } from "@shared";
import { adjustNetwork, examples } from "./examples";

export function createApp(): express.Express {
  const app = express();
  app.use(express.json());

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/networks", (_req, res) => {
    res.json({ networks: [...examples.keys()] });
  });

  // Builds and adjusts the network on every request
  app.get("/networks/:name.xodr", (req, res, next) => {
    const build = examples.get(req.params.name);
    if (!build) {
      res.status(404).json({ error: `Unknown network ${req.params.name}` });
      return;
    }
    try {
      res.type("application/xml").send(adjustNetwork(build()).toXml());
    } catch (err) {
      next(err);
    }
  });

  app.use((_req, res) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof OpenDriveError) {
      logger.warn(`${req.path}: ${err.name}: ${err.message}`);
      res.status(422).json({ error: err.message, type: err.name });
      return;
    }
    logger.error(`${req.path}: unexpected failure`, err);
    res.status(500).json({ error: "Internal server error" });
  });

  return app;
}
