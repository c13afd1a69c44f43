import { appendFileSync, mkdirSync } from 'fs';
import path from 'path';

/** JSONL transcript of one prompt session: keys, status changes, answers. */
export class Tracker {
  readonly eventsPath: string;

  constructor(slug: string, logsBase: string) {
    const dir = path.join(logsBase, slug);
    mkdirSync(dir, { recursive: true });
    this.eventsPath = path.join(dir, 'events.jsonl');
  }

  logEvent(type: string, data: Record<string, unknown>): void {
    const line = JSON.stringify({ timestamp: new Date().toISOString(), type, data });
    appendFileSync(this.eventsPath, line + '\n');
  }

  logAnswers(answers: Record<string, unknown>): void {
    if (Object.keys(answers).length === 0) return;
    this.logEvent('answers', { answers });
  }
}
