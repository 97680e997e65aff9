import type { ActivityLogInput, ActivityLogPort } from '@carpool/domain';

/** Best-effort activity logging. A mutation that went through is not failed by a log write. */
export async function writeActivityLog(log: ActivityLogPort, input: ActivityLogInput): Promise<void> {
  try {
    await log.append(input);
  } catch (err) {
    console.error('[activity-log] failed to write activity entry', err);
  }
}
