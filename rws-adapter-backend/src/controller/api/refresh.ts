import { Request, Response } from "express";
import { ApiContext } from "./context";
import { sendFailure } from "./failure";

export function refreshStaticInfo(ctx: ApiContext) {
  return async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.synchronizer.refreshStaticInfo());
    } catch (error) {
      sendFailure(res, "refreshStaticInfo", error);
    }
  };
}

export function refreshSignals(ctx: ApiContext) {
  return async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.synchronizer.refreshSignals());
    } catch (error) {
      sendFailure(res, "refreshSignals", error);
    }
  };
}

export function refreshMechanicalUnit(ctx: ApiContext) {
  return async (req: Request, res: Response) => {
    try {
      res.json(await ctx.synchronizer.refreshMechanicalUnit(req.params.unit));
    } catch (error) {
      sendFailure(res, "refreshMechanicalUnit", error);
    }
  };
}
