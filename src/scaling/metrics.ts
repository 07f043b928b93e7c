/**
 * Lightweight Prometheus-compatible metrics — no external dependencies
 *
 * Exposes counters for issuance and every scan outcome, an HTTP request
 * latency histogram and process gauges in Prometheus text format.
 */

import { NextFunction, Request, Response } from 'express';

interface Histogram {
  help: string;
  buckets: number[];
  counts: number[]; // One per bucket + 1 for +Inf, not cumulative
  sum: number;
  count: number;
}

export class MetricsCollector {
  private counters: Map<string, { value: number; help: string }> = new Map();
  private gauges: Map<string, { value: number; help: string }> = new Map();
  private histograms: Map<string, Histogram> = new Map();

  constructor() {
    this.registerCounter('checkin_http_requests_total', 'Total HTTP requests');
    this.registerCounter('checkin_registrations_issued_total', 'Total registrations issued');
    this.registerCounter('checkin_registrations_voided_total', 'Total registrations voided');
    this.registerCounter('checkin_scans_accepted_total', 'Scans that checked a registration in');
    this.registerCounter('checkin_scans_duplicate_total', 'Scans of an already checked-in registration');
    this.registerCounter('checkin_scans_invalid_total', 'Scans rejected as invalid, forged, voided or expired');
    this.registerCounter('checkin_scans_rejected_total', 'Scans failed closed because storage was unavailable');

    this.registerGauge('checkin_memory_heap_bytes', 'Heap memory used in bytes');
    this.registerGauge('checkin_uptime_seconds', 'Process uptime in seconds');

    this.registerHistogram('checkin_http_request_duration_seconds', 'HTTP request duration', [
      0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5,
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
    const index = hist.buckets.findIndex((upper) => value <= upper);
    hist.counts[index === -1 ? hist.buckets.length : index]++;
  }

  /**
   * Express middleware to track request latency and count
   */
  httpMiddleware() {
    return (_req: Request, res: Response, next: NextFunction): void => {
      const start = process.hrtime.bigint();
      this.incCounter('checkin_http_requests_total');

      res.on('finish', () => {
        const durationSec = Number(process.hrtime.bigint() - start) / 1e9;
        this.observeHistogram('checkin_http_request_duration_seconds', durationSec);
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

    this.setGauge('checkin_memory_heap_bytes', process.memoryUsage().heapUsed);
    this.setGauge('checkin_uptime_seconds', Math.round(process.uptime()));

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
