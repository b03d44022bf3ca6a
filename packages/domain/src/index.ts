export { EnergyPrice } from "./price";
export { Percentage } from "./percentage";
export { describeError, EmptyDataError, PriceAcquisitionError, ScheduleInvariantError } from "./errors";
export * from "./parsing";
export { rawPriceRecordListSchema, rawPriceRecordSchema } from "./schedule";
export type {
  RawPriceRecord,
  ScheduleAction,
  ScheduleAssignmentPayload,
  ScheduleRangePayload,
  ScheduleResponse,
} from "./schedule";
