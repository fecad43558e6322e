/**
 * @entry Scheduler 调度模块
 *
 * 事件总线、有界优先级队列、整合调度器
 *
 * 能力分组：
 * - 事件总线: createEventBus（至少一次投递，监听器失败只记日志）
 * - 队列: createQueue（容量上限 + 优先级 + 同级 FIFO）
 * - 整合: ConsolidationScheduler（node-cron 定时 + 手动触发，重叠跳过）
 */

export { type EventHandler, type EventBus, type EventBusOptions, createEventBus } from './eventBus.js'

export { type QueueItem, type Queue, type QueueOptions, createQueue } from './queue.js'

export {
  type RunTrigger,
  type ConsolidationRunReport,
  type ConsolidationSchedulerOptions,
  ConsolidationScheduler,
} from './ConsolidationScheduler.js'
