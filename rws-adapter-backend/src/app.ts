import express from "express";
import cors from "cors";
import { createRouter } from "./controller/api/route";
import { ApiContext } from "./controller/api/context";

export function createApp(ctx: ApiContext) {
  const app = express();

  app.use(cors({ origin: "*", credentials: true }));
  app.use(express.json());
  app.use("/", createRouter(ctx));

  return app;
}
