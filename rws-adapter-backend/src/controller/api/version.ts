import { Request, Response } from "express";
import { config } from "../../config/config";

// npm sets npm_package_version when the service is started through a script.
export const getVersion = (_req: Request, res: Response): void => {
  res.status(200).json({
    application: config.application.name,
    version: process.env.npm_package_version ?? "unknown",
    node: process.version,
  });
};
