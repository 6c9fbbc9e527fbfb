import { createLogger } from '../../src/observability/logger';

describe('logger', () => {
  function capture() {
    const lines: string[] = [];
    const log = createLogger({
      write(msg: string) {
        lines.push(msg);
      },
    });
    return { log, lines };
  }

  it('should redact customer emails in nested fields', () => {
    const { log, lines } = capture();

    log.info(
      {
        email: 'maria@example.com',
        contact: { name: 'Maria', email: 'maria@example.com' },
        session: { escalation: { email: 'maria@example.com' } },
      },
      'Contact captured',
    );

    const entry = JSON.parse(lines[0]);
    expect(entry.email).toBe('[REDACTED]');
    expect(entry.contact).toEqual({ name: 'Maria', email: '[REDACTED]' });
    expect(entry.session.escalation.email).toBe('[REDACTED]');
    expect(entry.msg).toBe('Contact captured');
    expect(entry.service).toBe('store-assistant');
  });

  it('should write the level as a label', () => {
    const { log, lines } = capture();
    log.warn('careful');
    expect(JSON.parse(lines[0]).level).toBe('warn');
  });
});
