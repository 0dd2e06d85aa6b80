/**
 * Mock Audit Logger for Testing
 *
 * Captures every emitted event in memory so tests can assert on what a
 * component audited.
 *
 * @module tests/helpers/audit-mock
 */

import type { AuditEvent, AuditEventType, AuditLogger } from "../../src/logging/audit-types.js";

export class MockAuditLogger implements AuditLogger {
  /** All captured events, oldest first */
  public readonly events: AuditEvent[] = [];

  private enabled: boolean = true;

  emit(event: AuditEvent): void {
    if (!this.enabled) {
      return;
    }
    this.events.push(event);
  }

  getUserEvents(subjectId: string, limit: number = 100): AuditEvent[] {
    return this.newestFirst((event) => event.subjectId === subjectId, limit);
  }

  getEventsByType(eventType: AuditEventType, limit: number = 100): AuditEvent[] {
    return this.newestFirst((event) => event.eventType === eventType, limit);
  }

  getRecentEvents(limit: number = 50): AuditEvent[] {
    return this.newestFirst(() => true, limit);
  }

  async flush(): Promise<void> {}

  isEnabled(): boolean {
    return this.enabled;
  }

  // ============================================================================
  // Test helpers
  // ============================================================================

  /** Captured events of one type, oldest first */
  ofType(eventType: AuditEventType): AuditEvent[] {
    return this.events.filter((event) => event.eventType === eventType);
  }

  /** Event types in emission order */
  types(): AuditEventType[] {
    return this.events.map((event) => event.eventType);
  }

  lastEvent(): AuditEvent | undefined {
    return this.events[this.events.length - 1];
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  clear(): void {
    this.events.length = 0;
  }

  private newestFirst(predicate: (event: AuditEvent) => boolean, limit: number): AuditEvent[] {
    return this.events.filter(predicate).reverse().slice(0, limit);
  }
}

export function createMockAuditLogger(): MockAuditLogger {
  return new MockAuditLogger();
}
