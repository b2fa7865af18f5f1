import {
  type DNSQuery,
  type DNSResponse,
  formatMessage,
  ResultKind,
} from '@hopdns/protocol'
import { createLogger, type Logger } from '../lib/logger'
import type { ZoneRole, ZoneStub } from './types'

/**
 * Shared control flow for every zone stub: count, look up, log.
 * Variants only decide the answer.
 */
export abstract class BaseZoneStub implements ZoneStub {
  abstract readonly role: ZoneRole
  protected readonly log: Logger
  private handled = 0

  constructor(component: string) {
    this.log = createLogger(component)
  }

  get queryCount(): number {
    return this.handled
  }

  handle(query: DNSQuery): DNSResponse {
    this.handled++
    const response = this.lookup(query)

    const data = {
      query: this.handled,
      domain: query.domain,
      answer: formatMessage(response),
    }
    if (response.result.kind === ResultKind.ERROR) {
      this.log.warn('Query rejected', data)
    } else {
      this.log.info('Query answered', data)
    }

    return response
  }

  protected abstract lookup(query: DNSQuery): DNSResponse
}
