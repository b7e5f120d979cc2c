import * as client from 'prom-client';

type DeleteMode = 'bulk' | 'single';

function getCounter<L extends string>(name: string, help: string, labelNames: L[] = []): client.Counter<L> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) {
    return existing;
  }
  return new client.Counter<L>({ name, help, labelNames });
}

function getGauge(name: string, help: string): client.Gauge {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Gauge) {
    return existing;
  }
  return new client.Gauge({ name, help });
}

const scanCycles = getCounter('retention_scan_cycles_total', 'Completed retention scan cycles', ['trigger', 'result']);
const channelsPruned = getCounter('retention_channels_pruned_total', 'Channel policies removed because the channel no longer exists');
const messagesDeleted = getCounter('retention_messages_deleted_total', 'Messages deleted by the retention engine', ['mode']);
const alreadyGone = getCounter('retention_messages_already_gone_total', 'Deletions skipped because the message had vanished');
const deleteFailures = getCounter('retention_delete_failures_total', 'Delete calls that failed', ['mode']);
const bulkFallbacks = getCounter('retention_bulk_fallbacks_total', 'Bulk deletes that fell back to single deletions');
const pacingDelay = getGauge('retention_rate_limit_delay_seconds', 'Current pause before each delete call');

export const retentionMetrics = {
  recordCycle(trigger: 'scheduled' | 'manual', result: 'ok' | 'error'): void {
    scanCycles.inc({ trigger, result });
  },
  recordPruned(): void {
    channelsPruned.inc();
  },
  recordDeleted(mode: DeleteMode, count: number): void {
    if (count > 0) messagesDeleted.inc({ mode }, count);
  },
  recordAlreadyGone(): void {
    alreadyGone.inc();
  },
  recordDeleteFailure(mode: DeleteMode): void {
    deleteFailures.inc({ mode });
  },
  recordBulkFallback(): void {
    bulkFallbacks.inc();
  },
  setPacingDelay(seconds: number): void {
    pacingDelay.set(seconds);
  },
};
