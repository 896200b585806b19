import { buildChartSlices, chartTitle, formatShare, type ChartSlice } from '../lib/chart';
import { formatMinutes } from '../lib/time';
import type { DaySummary } from '../lib/types';

type SummaryChartProps = {
  summary: DaySummary;
};

const SIZE = 360;
const CENTER = SIZE / 2;
const VIEWBOX_PAD = 10;
const OUTER_RADIUS = 160;
const HOLE_RATIO = 0.3;
const INNER_RADIUS = OUTER_RADIUS * HOLE_RATIO;
const RING_RADIUS = (OUTER_RADIUS + INNER_RADIUS) / 2;
const RING_WIDTH = OUTER_RADIUS - INNER_RADIUS;
const MIN_LABEL_SHARE = 0.04;
const GOLDEN_ANGLE = 137.508;
const HUE_OFFSET = 12;

function sliceStroke(radius: number, slice: ChartSlice): { dasharray: string; dashoffset: number } {
  const circumference = 2 * Math.PI * radius;
  const length = (slice.endFraction - slice.startFraction) * circumference;
  return {
    dasharray: `${length} ${circumference - length}`,
    dashoffset: -slice.startFraction * circumference
  };
}

function ringPoint(fraction: number, radius: number): { x: number; y: number } {
  const angle = fraction * Math.PI * 2 - Math.PI / 2;
  return {
    x: CENTER + Math.cos(angle) * radius,
    y: CENTER + Math.sin(angle) * radius
  };
}

export const UNPLANNED_COLOR = 'hsl(220 8% 78%)';

/** Neighbouring slices step a golden angle around the full hue wheel and alternate tone. */
export function sliceColor(index: number, unplanned: boolean): string {
  if (unplanned) return UNPLANNED_COLOR;
  const hue = Math.round((HUE_OFFSET + index * GOLDEN_ANGLE) % 360);
  return index % 2 === 0 ? `hsl(${hue} 78% 52%)` : `hsl(${hue} 66% 64%)`;
}

export function SummaryChart({ summary }: SummaryChartProps): JSX.Element {
  const slices = buildChartSlices(summary);
  const title = chartTitle(summary);

  return (
    <figure className="summary-chart">
      <figcaption>{title}</figcaption>
      <svg
        className="donut"
        role="img"
        aria-label={title}
        viewBox={`${-VIEWBOX_PAD} ${-VIEWBOX_PAD} ${SIZE + VIEWBOX_PAD * 2} ${SIZE + VIEWBOX_PAD * 2}`}
      >
        {slices.map((slice, index) => {
          const stroke = sliceStroke(RING_RADIUS, slice);
          return (
            <circle
              key={`slice-${index}`}
              cx={CENTER}
              cy={CENTER}
              r={RING_RADIUS}
              className="pie-slice"
              fill="none"
              strokeWidth={RING_WIDTH}
              style={{ stroke: sliceColor(index, slice.unplanned) }}
              strokeDasharray={stroke.dasharray}
              strokeDashoffset={stroke.dashoffset}
              transform={`rotate(-90 ${CENTER} ${CENTER})`}
            >
              <title>{`${slice.label}: ${formatMinutes(slice.minutes)}`}</title>
            </circle>
          );
        })}
        {slices
          .map((slice, index) => ({ slice, index }))
          .filter(({ slice }) => slice.share >= MIN_LABEL_SHARE)
          .map(({ slice, index }) => {
            const point = ringPoint((slice.startFraction + slice.endFraction) / 2, RING_RADIUS);
            return (
              <text
                key={`label-${index}`}
                x={point.x}
                y={point.y}
                className="slice-label"
                textAnchor="middle"
                dominantBaseline="middle"
              >
                {`${slice.label} ${formatShare(slice.share)}`}
              </text>
            );
          })}
        <text x={CENTER} y={CENTER} className="donut-total" textAnchor="middle" dominantBaseline="middle">
          {formatMinutes(summary.recordedMinutes)}
        </text>
      </svg>
    </figure>
  );
}
