import { describe, it, expect } from 'vitest';
import { escapeHtml, renderSignalMessage, MAX_MESSAGE_LENGTH } from '../../src/services/message-format.js';
import { parseInboundEvent } from '../../src/utils/validators.js';

describe('renderSignalMessage', () => {
  it('renders the minimal alert', () => {
    const text = renderSignalMessage({
      ticker: 'BTCUSDT',
      signal: 'Buy',
      price: 45000,
      time: '2025-08-05T18:30:00Z',
    });
    expect(text).toBe(['<b>BTCUSDT</b>', 'Signal: <i>Buy</i>  Price: 45000', '🕒 2025-08-05T18:30:00Z'].join('\n'));
  });

  it('adds the interval to the header and a chart link', () => {
    const text = renderSignalMessage({
      ticker: 'ETHUSDT',
      signal: 'Sell',
      price: 3120.5,
      time: '2025-08-05T18:30:00Z',
      interval: '4h',
      chart: 'https://www.tradingview.com/chart/?symbol=ETHUSDT&interval=240',
    });
    expect(text.split('\n')).toEqual([
      '<b>ETHUSDT</b>  (4h)',
      'Signal: <i>Sell</i>  Price: 3120.5',
      '🕒 2025-08-05T18:30:00Z',
      '📈 <a href="https://www.tradingview.com/chart/?symbol=ETHUSDT&amp;interval=240">Chart</a>',
    ]);
  });

  it('escapes markup in free-text fields', () => {
    const text = renderSignalMessage({
      ticker: 'A<B>',
      signal: 'Buy',
      price: 1,
      time: '2025-08-05T18:30:00Z',
      interval: '1h&"x"',
    });
    expect(text.split('\n')[0]).toBe('<b>A&lt;B&gt;</b>  (1h&amp;&quot;x&quot;)');
  });

  it('leaves out a chart link that would exceed the message limit once escaped', () => {
    const chart = `https://example.com/?${'a&'.repeat(1000)}`;
    const parsed = parseInboundEvent(
      Buffer.from(JSON.stringify({ ticker: 'BTCUSDT', signal: 'Buy', price: 45000, time: '2025-08-05T18:30:00Z', chart })),
    );
    if (!parsed.ok) throw new Error('expected a valid event');

    const text = renderSignalMessage(parsed.event);
    expect(text).toBe('<b>BTCUSDT</b>\nSignal: <i>Buy</i>  Price: 45000\n🕒 2025-08-05T18:30:00Z');
    expect(text.length).toBeLessThanOrEqual(MAX_MESSAGE_LENGTH);
  });
});

describe('escapeHtml', () => {
  it('leaves plain text alone', () => {
    expect(escapeHtml('BTCUSDT 1h')).toBe('BTCUSDT 1h');
  });

  it('escapes ampersands before other entities', () => {
    expect(escapeHtml('&lt;')).toBe('&amp;lt;');
  });
});
