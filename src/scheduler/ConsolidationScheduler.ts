/**
 * 整合调度器
 *
 * 按固定间隔（node-cron）调用 MemoryManager.consolidate()，也支持手动触发。
 * 同一时刻只有一次整合在跑：重叠的运行直接跳过，不排队。
 */

import cron from 'node-cron'
import type { MemoryManager } from '../memory/MemoryManager.js'
import type { ConsolidationSummary } from '../memory/types.js'
import { getErrorMessage } from '../shared/assertError.js'
import { systemClock, formatDuration, intervalToCron, type Clock } from '../shared/formatTime.js'
import { createLogger, logError } from '../shared/logger.js'

const logger = createLogger('consolidation')

export type RunTrigger = 'scheduled' | 'manual'

export interface ConsolidationRunReport {
  status: 'completed' | 'skipped' | 'failed'
  trigger: RunTrigger
  summary?: ConsolidationSummary
  error?: string
  durationMs: number
}

export interface ConsolidationSchedulerOptions {
  memory: Pick<MemoryManager, 'consolidate'>
  /** 30s / 5m / 1h / 1d，默认 5m */
  interval?: string
  clock?: Clock
}

interface InFlightRun {
  controller: AbortController
  promise: Promise<ConsolidationRunReport>
}

export class ConsolidationScheduler {
  private readonly memory: Pick<MemoryManager, 'consolidate'>
  private readonly clock: Clock
  readonly interval: string
  private readonly cronExpr: string
  private job: cron.ScheduledTask | null = null
  private inFlight: InFlightRun | null = null
  private last: ConsolidationRunReport | null = null

  constructor(options: ConsolidationSchedulerOptions) {
    this.memory = options.memory
    this.clock = options.clock ?? systemClock
    this.interval = options.interval ?? '5m'
    this.cronExpr = intervalToCron(this.interval)
  }

  get isScheduled(): boolean {
    return this.job !== null
  }

  get isRunning(): boolean {
    return this.inFlight !== null
  }

  get lastReport(): ConsolidationRunReport | null {
    return this.last
  }

  /** 注册定时任务；重复调用无副作用 */
  start(): void {
    if (this.job) return
    this.job = cron.schedule(this.cronExpr, () => this.run('scheduled'))
    logger.info(`Consolidation scheduled every ${this.interval} (${this.cronExpr})`)
  }

  /** 手动触发一次；已有运行在进行时返回 skipped */
  trigger(): Promise<ConsolidationRunReport> {
    return this.run('manual')
  }

  /**
   * 停止定时任务，取消并等待进行中的运行
   */
  async stop(): Promise<void> {
    if (this.job) {
      this.job.stop()
      this.job = null
      logger.info('Consolidation schedule stopped')
    }
    const running = this.inFlight
    if (running) {
      running.controller.abort(new Error('Consolidation scheduler stopped'))
      await running.promise
    }
  }

  private run(trigger: RunTrigger): Promise<ConsolidationRunReport> {
    if (this.inFlight) {
      logger.debug(`Skipping ${trigger} consolidation: a run is already in progress`)
      return Promise.resolve({ status: 'skipped', trigger, durationMs: 0 })
    }

    const controller = new AbortController()
    const promise = this.execute(trigger, controller.signal).finally(() => {
      this.inFlight = null
    })
    this.inFlight = { controller, promise }
    return promise
  }

  private async execute(trigger: RunTrigger, signal: AbortSignal): Promise<ConsolidationRunReport> {
    const startedMs = this.clock().getTime()
    const elapsed = () => this.clock().getTime() - startedMs

    let report: ConsolidationRunReport
    try {
      const summary = await this.memory.consolidate({ signal })
      for (const failure of summary.errors) {
        logger.warn(`Rule ${failure.rule} failed for ${failure.key}: ${failure.message}`)
      }
      report = { status: 'completed', trigger, summary, durationMs: elapsed() }
      logger.debug(`${trigger} consolidation completed in ${formatDuration(report.durationMs)}`)
    } catch (error) {
      logError(logger, `${trigger} consolidation failed`, error)
      report = { status: 'failed', trigger, error: getErrorMessage(error), durationMs: elapsed() }
    }
    this.last = report
    return report
  }
}
