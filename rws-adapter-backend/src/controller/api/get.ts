import { Request, Response } from "express";
import { ApiContext } from "./context";
import { sendFailure } from "./failure";

export function getStatus(ctx: ApiContext) {
  return (_req: Request, res: Response) => {
    res.json(ctx.status.getAll());
  };
}

export function getStaticInfo(ctx: ApiContext) {
  return (_req: Request, res: Response) => {
    const staticInfo = ctx.snapshots.getStaticInfo();
    if (staticInfo) {
      res.json(staticInfo);
    } else {
      res.status(404).json({ message: "Static info has not been read yet." });
    }
  };
}

export function getSignals(ctx: ApiContext) {
  return (_req: Request, res: Response) => {
    const signals = ctx.snapshots.getSignals();
    if (signals) {
      res.json(signals);
    } else {
      res.status(404).json({ message: "Signals have not been read yet." });
    }
  };
}

export function getSignal(ctx: ApiContext) {
  return (req: Request, res: Response) => {
    const { name } = req.params;
    const signal = ctx.snapshots.getSignals()?.get(name);
    if (signal) {
      res.json({ name, ...signal });
    } else {
      res.status(404).json({ message: `Signal '${name}' not found.` });
    }
  };
}

export function getMechanicalUnitNames(ctx: ApiContext) {
  return (_req: Request, res: Response) => {
    res.json(ctx.snapshots.getMechanicalUnitNames());
  };
}

export function getMechanicalUnit(ctx: ApiContext) {
  return (req: Request, res: Response) => {
    const { unit } = req.params;
    const snapshot = ctx.snapshots.getMechanicalUnit(unit);
    if (snapshot) {
      res.json(snapshot);
    } else {
      res
        .status(404)
        .json({ message: `Mechanical unit '${unit}' has not been read yet.` });
    }
  };
}

export function getRobotWareOptions(ctx: ApiContext) {
  return async (_req: Request, res: Response) => {
    try {
      res.json(await ctx.synchronizer.fetchRobotWareOptions());
    } catch (error) {
      sendFailure(res, "getRobotWareOptions", error);
    }
  };
}

export function getRapidModules(ctx: ApiContext) {
  return async (req: Request, res: Response) => {
    try {
      res.json(await ctx.synchronizer.fetchRapidModules(req.params.task));
    } catch (error) {
      sendFailure(res, "getRapidModules", error);
    }
  };
}
