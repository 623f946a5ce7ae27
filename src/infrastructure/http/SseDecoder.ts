import { StringDecoder } from 'string_decoder';

export interface RawSseEvent {
  event: string;
  data: string;
  id?: string; // only when this event carried its own id field
}

/**
 * Incremental text/event-stream decoder.
 *
 * Feed it chunks as they arrive; it returns every event completed by a
 * blank line. Lines may end in \r\n, \n or \r, and a chunk boundary may
 * fall anywhere, including between \r and \n.
 */
export class SseDecoder {
  private decoder = new StringDecoder('utf8');
  private buffer = '';
  private eventName = '';
  private dataLines: string[] = [];
  private eventId: string | undefined;

  push(chunk: Buffer | string): RawSseEvent[] {
    this.buffer += typeof chunk === 'string' ? chunk : this.decoder.write(chunk);

    let text = this.buffer;
    let held = '';
    if (text.endsWith('\r')) {
      // Might be the first half of \r\n
      held = '\r';
      text = text.slice(0, -1);
    }

    const lines = text.split(/\r\n|\r|\n/);
    this.buffer = (lines.pop() ?? '') + held;

    const events: RawSseEvent[] = [];
    for (const line of lines) {
      this.processLine(line, events);
    }
    return events;
  }

  /**
   * End of input. A trailing event without its blank line is still delivered.
   */
  flush(): RawSseEvent[] {
    const events: RawSseEvent[] = [];
    const rest = this.buffer + this.decoder.end();
    this.buffer = '';

    if (rest.length > 0) {
      for (const line of rest.split(/\r\n|\r|\n/)) {
        this.processLine(line, events);
      }
    }
    this.dispatch(events);
    return events;
  }

  private processLine(line: string, events: RawSseEvent[]): void {
    if (line === '') {
      this.dispatch(events);
      return;
    }

    if (line.startsWith(':')) {
      return; // comment
    }

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) {
      value = value.slice(1);
    }

    switch (field) {
      case 'event':
        this.eventName = value.trim();
        break;
      case 'data':
        this.dataLines.push(value);
        break;
      case 'id':
        if (!value.includes('\0')) {
          this.eventId = value || undefined;
        }
        break;
      default:
        // retry and unknown fields are ignored
        break;
    }
  }

  private dispatch(events: RawSseEvent[]): void {
    if (this.eventName === '' && this.dataLines.length === 0) {
      return;
    }

    events.push({
      event: this.eventName || 'message',
      data: this.dataLines.join('\n'),
      id: this.eventId,
    });

    this.eventName = '';
    this.dataLines = [];
    this.eventId = undefined;
  }
}
