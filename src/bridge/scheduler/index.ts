export {
  HostScheduler,
  type DrainReport,
  type HostSchedulerOptions,
  type TaskSettlement,
} from "./host-scheduler";
export { HostThreadGuard } from "./host-guard";
export { Rendezvous, type RendezvousResult } from "./rendezvous";
export { IntervalTickSource, type HostTickSource } from "./tick-source";
