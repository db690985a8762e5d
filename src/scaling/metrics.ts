/**
 * Lightweight Prometheus-compatible metrics: no external dependencies
 *
 * Exposes /metrics in Prometheus text format for:
 * - Units of work committed and rolled back
 * - Orders settled and collaborator rotations
 * - HTTP request latency histograms
 * - Memory/uptime gauges
 */

import type { NextFunction, Request, Response } from 'express';

interface Histogram {
  help: string;
  buckets: number[];
  counts: number[]; // One per bucket + 1 for +Inf
  sum: number;
  count: number;
}

export class MetricsCollector {
  private counters: Map<string, { value: number; help: string }> = new Map();
  private gauges: Map<string, { value: number; help: string }> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.registerCounter('ledger_http_requests_total', 'Total HTTP requests');
    this.registerCounter('ledger_units_committed_total', 'Units of work committed');
    this.registerCounter('ledger_units_rolled_back_total', 'Units of work rolled back');
    this.registerCounter('ledger_notifications_total', 'Notifications delivered to sinks');
    this.registerCounter('ledger_sink_failures_total', 'Notification sink failures');
    this.registerCounter('ledger_orders_processed_total', 'Orders settled');
    this.registerCounter('ledger_rotations_total', 'Collaborator pointers rotated');

    this.registerGauge('ledger_memory_heap_bytes', 'Heap memory used in bytes');
    this.registerGauge('ledger_uptime_seconds', 'Process uptime in seconds');
    this.registerGauge('ledger_next_order_id', 'Next ledger id to be allocated');

    this.registerHistogram('ledger_http_request_duration_seconds', 'HTTP request duration', [
      0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10,
    ]);
  }

  registerCounter(name: string, help: string): void {
    if (!this.counters.has(name)) {
      this.counters.set(name, { value: 0, help });
    }
  }

  registerGauge(name: string, help: string): void {
    if (!this.gauges.has(name)) {
      this.gauges.set(name, { value: 0, help });
    }
  }

  registerHistogram(name: string, help: string, buckets: number[]): void {
    if (!this.histograms.has(name)) {
      this.histograms.set(name, {
        help,
        buckets: [...buckets].sort((a, b) => a - b),
        counts: new Array<number>(buckets.length + 1).fill(0),
        sum: 0,
        count: 0,
      });
    }
  }

  incCounter(name: string, amount: number = 1): void {
    const counter = this.counters.get(name);
    if (counter) counter.value += amount;
  }

  getCounter(name: string): number {
    return this.counters.get(name)?.value ?? 0;
  }

  setGauge(name: string, value: number): void {
    const gauge = this.gauges.get(name);
    if (gauge) gauge.value = value;
  }

  observeHistogram(name: string, value: number): void {
    const hist = this.histograms.get(name);
    if (!hist) return;
    hist.sum += value;
    hist.count++;
    // Per-bucket counts; render() accumulates them
    let bucket = hist.buckets.findIndex(bound => value <= bound);
    if (bucket === -1) bucket = hist.buckets.length;
    hist.counts[bucket]++;
  }

  /**
   * Express middleware to track request latency and count
   */
  httpMiddleware() {
    return (_req: Request, res: Response, next: NextFunction): void => {
      const start = process.hrtime.bigint();
      this.incCounter('ledger_http_requests_total');

      res.on('finish', () => {
        const durationNs = Number(process.hrtime.bigint() - start);
        this.observeHistogram('ledger_http_request_duration_seconds', durationNs / 1e9);
      });

      next();
    };
  }

  /**
   * Render all metrics in Prometheus exposition format
   */
  render(): string {
    const lines: string[] = [];

    for (const [name, c] of this.counters) {
      lines.push(`# HELP ${name} ${c.help}`);
      lines.push(`# TYPE ${name} counter`);
      lines.push(`${name} ${c.value}`);
    }

    // Gauges: refresh dynamic values
    this.setGauge('ledger_memory_heap_bytes', process.memoryUsage().heapUsed);
    this.setGauge('ledger_uptime_seconds', Math.round(process.uptime()));

    for (const [name, g] of this.gauges) {
      lines.push(`# HELP ${name} ${g.help}`);
      lines.push(`# TYPE ${name} gauge`);
      lines.push(`${name} ${g.value}`);
    }

    for (const [name, h] of this.histograms) {
      lines.push(`# HELP ${name} ${h.help}`);
      lines.push(`# TYPE ${name} histogram`);
      let cumulative = 0;
      for (let i = 0; i < h.buckets.length; i++) {
        cumulative += h.counts[i];
        lines.push(`${name}_bucket{le="${h.buckets[i]}"} ${cumulative}`);
      }
      lines.push(`${name}_bucket{le="+Inf"} ${h.count}`);
      lines.push(`${name}_sum ${h.sum}`);
      lines.push(`${name}_count ${h.count}`);
    }

    return lines.join('\n') + '\n';
  }
}

// Singleton
export const metrics = new MetricsCollector();
