import { getKpiCompletion, type KpiTarget } from '@salesdesk/core';

export type KpiProgress = KpiTarget & { completion: number; achieved: boolean };

export const toKpiProgress = (target: KpiTarget): KpiProgress => ({
  ...target,
  completion: Number(getKpiCompletion(target).toFixed(1)),
  achieved: target.currentValue >= target.targetValue,
});
