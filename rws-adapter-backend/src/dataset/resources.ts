/**
 * Robot Web Services resource paths, relative to the controller base URL.
 *
 * Example: `rwsResources.mechanicalUnit("ROB_1", "static")` returns
 * "/rw/motionsystem/mechunits/ROB_1?resource=static".
 */
export const rwsResources = {
  rapidTasks: "/rw/rapid/tasks",
  system: "/rw/system",
  controllerIdentity: "/ctrl/identity",
  robotWareOptions: "/rw/system/options",
  ioSignals: "/rw/iosystem/signals",
  rapidModules: (task: string) =>
    `/rw/rapid/modules?task=${encodeURIComponent(task)}`,
  mechanicalUnit: (unit: string, resource: "static" | "dynamic") =>
    `/rw/motionsystem/mechunits/${encodeURIComponent(unit)}?resource=${resource}`,
};
