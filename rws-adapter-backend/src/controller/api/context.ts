import { ControllerSynchronizer } from "../../services/synchronizer";
import { SnapshotStore } from "../../store/snapshotstore";
import { StatusStore } from "../../store/statusstore";

export interface ApiContext {
  snapshots: SnapshotStore;
  status: StatusStore;
  synchronizer: ControllerSynchronizer;
}
