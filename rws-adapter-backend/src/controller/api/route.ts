import express from "express";
import { ApiContext } from "./context";
import {
  getMechanicalUnit,
  getMechanicalUnitNames,
  getRapidModules,
  getRobotWareOptions,
  getSignal,
  getSignals,
  getStaticInfo,
  getStatus,
} from "./get";
import {
  refreshMechanicalUnit,
  refreshSignals,
  refreshStaticInfo,
} from "./refresh";
import { getVersion } from "./version";

export function createRouter(ctx: ApiContext) {
  const router = express.Router();

  router.get("/status", getStatus(ctx));
  router.get("/version", getVersion);
  router.get("/static-info", getStaticInfo(ctx));
  router.get("/signals", getSignals(ctx));
  router.get("/signals/:name", getSignal(ctx));
  router.get("/mechunits", getMechanicalUnitNames(ctx));
  router.get("/mechunits/:unit", getMechanicalUnit(ctx));
  router.get("/options", getRobotWareOptions(ctx));
  router.get("/modules/:task", getRapidModules(ctx));

  router.post("/refresh/static-info", refreshStaticInfo(ctx));
  router.post("/refresh/signals", refreshSignals(ctx));
  router.post("/refresh/mechunits/:unit", refreshMechanicalUnit(ctx));

  router.use((_req, res) => {
    res.status(404).json({ message: "End point is not found" });
  });

  return router;
}
