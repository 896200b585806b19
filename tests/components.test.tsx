import { renderToStaticMarkup } from 'react-dom/server';
import { describe, expect, it } from 'vitest';
import { EntryTable, SummaryTable } from '../src/components/DataTables';
import { SummaryChart, UNPLANNED_COLOR, sliceColor } from '../src/components/SummaryChart';
import type { DaySummary, Entry } from '../src/lib/types';

const SUMMARY: DaySummary = {
  overflow: false,
  buckets: [
    { label: 'lunch', minutes: 60 },
    { label: 'work', minutes: 480 },
    { label: 'unplanned', minutes: 900 }
  ],
  recordedMinutes: 540
};

const OVERFLOW: DaySummary = {
  overflow: true,
  buckets: [
    { label: 'sleep', minutes: 540 },
    { label: 'work', minutes: 720 },
    { label: 'gaming', minutes: 480 }
  ],
  recordedMinutes: 1740
};

describe('sliceColor', () => {
  it('steps hues around the wheel and alternates tone', () => {
    expect(sliceColor(0, false)).toBe('hsl(12 78% 52%)');
    expect(sliceColor(1, false)).toBe('hsl(150 66% 64%)');
    expect(sliceColor(2, false)).toBe('hsl(287 78% 52%)');
    expect(sliceColor(3, true)).toBe(UNPLANNED_COLOR);
  });
});

describe('SummaryChart', () => {
  it('draws one slice per bucket with label and share', () => {
    const html = renderToStaticMarkup(<SummaryChart summary={SUMMARY} />);
    expect(html.match(/class="pie-slice"/g)).toHaveLength(3);
    expect(html).toContain('<figcaption>24-hour time allocation</figcaption>');
    expect(html).toContain('>work 33.3%</text>');
    expect(html).toContain('<title>unplanned: 15h</title>');
    expect(html).toContain('>9h</text>');
    expect(html).toContain(`stroke:${UNPLANNED_COLOR}`);
  });

  it('titles an overflowing day and greys no slice', () => {
    const html = renderToStaticMarkup(<SummaryChart summary={OVERFLOW} />);
    expect(html.match(/class="pie-slice"/g)).toHaveLength(3);
    expect(html).toContain('<figcaption>Recorded activity time allocation (over 24 hours: 1740 min)</figcaption>');
    expect(html).not.toContain(UNPLANNED_COLOR);
    expect(html).toContain('>29h</text>');
  });
});

describe('data tables', () => {
  it('lists entries with their literal times', () => {
    const entries: Entry[] = [
      { id: 'e1', name: 'sleep', start: { hour: 23, minute: 0 }, end: { hour: 1, minute: 0 }, durationMinutes: 120 }
    ];
    const html = renderToStaticMarkup(<EntryTable entries={entries} />);
    expect(html).toContain('<td>sleep</td><td>23:00</td><td>01:00</td><td>120</td>');
  });

  it('lists bucket totals', () => {
    const html = renderToStaticMarkup(<SummaryTable summary={SUMMARY} />);
    expect(html).toContain('<caption>24-hour totals</caption>');
    expect(html).toContain('<td>work</td><td>480</td><td>8h</td><td>33.3%</td>');
  });

  it('captions overflowing totals as recorded time', () => {
    const html = renderToStaticMarkup(<SummaryTable summary={OVERFLOW} />);
    expect(html).toContain('<caption>Recorded totals</caption>');
    expect(html).not.toContain('<td>unplanned</td>');
  });
});
