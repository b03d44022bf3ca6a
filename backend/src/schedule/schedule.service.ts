import { Inject, Injectable, Logger } from "@nestjs/common";
import { DateTime } from "luxon";

import { describeError } from "@spotwindow/domain";
import type { RawPriceRecord, ScheduleAssignmentPayload, ScheduleResponse } from "@spotwindow/domain";
import { PriceSourceService } from "../config/price-source.service";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { resolveTargetDay } from "./clock";
import { formatScheduleLine } from "./schedule-formatter";
import { runSchedulePipeline } from "./schedule-pipeline";
import type { Assignment, ScheduleParameters, ScheduleResult } from "./types";

export type ScheduleOverrides = Partial<Pick<ScheduleParameters, "maxChargeHours" | "capacityRatio" | "requiredMargin">>;

const round = (value: number): number => Math.round(value * 1000) / 1000;

function toAssignmentPayload(assignment: Assignment): ScheduleAssignmentPayload {
  const {block, discharge} = assignment;
  const dischargeStart = discharge[0]?.start.toISO() ?? null;
  return {
    charge_start: block.hours[0]?.start.toISO() ?? "",
    charge_hours: block.hours.length,
    charge_average_cost: round(block.averageCost),
    discharge_start: dischargeStart,
    discharge_hours: discharge.length,
    discharge_value: round(discharge.reduce((sum, hour) => sum + hour.cost - block.averageCost, 0)),
  };
}

@Injectable()
export class ScheduleService {
  private readonly logger = new Logger(ScheduleService.name);
  private latest: ScheduleResponse | null = null;

  constructor(
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
    @Inject(PriceSourceService) private readonly priceSource: PriceSourceService,
  ) {
  }

  getLatest(): ScheduleResponse | null {
    return this.latest;
  }

  /** Fetches the day's prices and plans it. `daySelector` falls back to `schedule.day`. */
  async computeForDay(daySelector?: string): Promise<ScheduleResponse> {
    const settings = this.configState.getSettings();
    const day = resolveTargetDay(daySelector ?? settings.day, settings.pricing.timeZone);
    this.logger.log(`Planning charge windows for ${day} (${settings.pricing.timeZone})`);

    const records = await this.priceSource.fetchDay(settings.source, day);
    const response = this.computeFromRecords(records, {}, day);
    this.latest = response;
    return response;
  }

  computeFromRecords(records: readonly RawPriceRecord[], overrides: ScheduleOverrides = {}, day?: string): ScheduleResponse {
    const settings = this.configState.getSettings();
    const params: ScheduleParameters = {
      ...settings.schedule,
      maxChargeHours: overrides.maxChargeHours ?? settings.schedule.maxChargeHours,
      capacityRatio: overrides.capacityRatio ?? settings.schedule.capacityRatio,
      requiredMargin: overrides.requiredMargin ?? settings.schedule.requiredMargin,
    };
    this.logger.verbose(
      `Schedule parameters: max_charge_hours=${params.maxChargeHours}, capacity_ratio=${params.capacityRatio}, ` +
      `required_margin=${params.requiredMargin}, charge_windows=${params.chargeWindows?.length ?? "any"}`,
    );

    let result: ScheduleResult;
    try {
      result = runSchedulePipeline(records, settings.pricing, params, day);
    } catch (error) {
      this.logger.error(`Schedule computation failed: ${describeError(error)}`);
      throw error;
    }

    const chargeHours = result.assignments.reduce((sum, a) => sum + a.block.hours.length, 0);
    const dischargeHours = result.assignments.reduce((sum, a) => sum + a.discharge.length, 0);
    this.logger.log(
      `Schedule for ${result.day}: ${result.assignments.length} cycle(s), ` +
      `${chargeHours} charge hour(s), ${dischargeHours} discharge hour(s)`,
    );
    if (!result.ranges.length) {
      this.logger.log("No hour clears the required margin; nothing to schedule");
    }

    return this.toResponse(result, params, settings.pricing.timeZone);
  }

  private toResponse(result: ScheduleResult, params: ScheduleParameters, timeZone: string): ScheduleResponse {
    return {
      day: result.day,
      generated_at: DateTime.now().toUTC().toISO() ?? new Date().toISOString(),
      time_zone: timeZone,
      required_margin: round(params.requiredMargin),
      hours: result.hours.length,
      ranges: result.ranges.map((range) => ({
        start: range.start.toISO() ?? "",
        end: range.end.toISO() ?? "",
        action: range.action,
        line: formatScheduleLine(range),
      })),
      assignments: result.assignments.map(toAssignmentPayload),
      lines: [...result.lines],
    };
  }
}
