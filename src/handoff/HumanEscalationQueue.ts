/**
 * Human escalation queue
 * Holds escalation tickets until an operator claims and resolves them
 */

import { createQueue, type Queue } from '../scheduler/queue.js'
import { InvalidStateError, NotFoundError } from '../shared/error.js'
import { createLogger } from '../shared/logger.js'
import type { EscalationTicket } from '../types/handoff.js'

const logger = createLogger('human-queue')

export class HumanEscalationQueue {
  private readonly queue: Queue<EscalationTicket>
  private readonly tickets = new Map<string, EscalationTicket>()

  constructor(options: { capacity?: number } = {}) {
    this.queue = createQueue<EscalationTicket>({ capacity: options.capacity, name: 'Human escalation queue' })
  }

  /** Throws UnavailableError when the queue is full */
  enqueue(ticket: EscalationTicket): void {
    this.queue.enqueue(ticket.ticketId, ticket, ticket.priority)
    this.tickets.set(ticket.ticketId, { ...ticket })
    logger.info(`Escalation ticket ${ticket.ticketId} queued for lead ${ticket.leadId}: ${ticket.reason}`)
  }

  /** Drop a ticket that was queued but never committed */
  discard(ticketId: string): void {
    this.queue.remove(ticketId)
    this.tickets.delete(ticketId)
  }

  /** Open tickets in claim order */
  waiting(): EscalationTicket[] {
    return this.queue.all().map(item => ({ ...item.data }))
  }

  get(ticketId: string): EscalationTicket | null {
    const ticket = this.tickets.get(ticketId)
    return ticket ? { ...ticket } : null
  }

  claim(ticketId: string, claimedBy: string): EscalationTicket {
    const ticket = this.require(ticketId)
    if (ticket.state !== 'open') {
      throw new InvalidStateError(`Ticket ${ticketId} is already ${ticket.state}`, { context: { ticketId } })
    }
    this.queue.remove(ticketId)
    const claimed: EscalationTicket = { ...ticket, state: 'claimed', claimedBy }
    this.tickets.set(ticketId, claimed)
    return { ...claimed }
  }

  /** Mark resolved; open tickets leave the queue as well */
  resolve(ticketId: string, resolvedBy: string, resolution?: string): EscalationTicket {
    const ticket = this.require(ticketId)
    if (ticket.state === 'resolved') {
      throw new InvalidStateError(`Ticket ${ticketId} is already resolved`, { context: { ticketId } })
    }
    this.queue.remove(ticketId)
    const resolved: EscalationTicket = { ...ticket, state: 'resolved', resolvedBy, resolution }
    this.tickets.set(ticketId, resolved)
    return { ...resolved }
  }

  size(): number {
    return this.queue.size()
  }

  private require(ticketId: string): EscalationTicket {
    const ticket = this.tickets.get(ticketId)
    if (!ticket) throw new NotFoundError('Escalation ticket', ticketId)
    return ticket
  }
}
