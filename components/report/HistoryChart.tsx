import type { ReactElement } from "react";
import { CartesianGrid, LineChart, Line, XAxis, YAxis } from "recharts";
import type { ObservedPoint } from "../../lib/report/chartData";
import { AXIS_TICK, CHART_HEIGHT, CHART_MARGIN, CHART_WIDTH, COLORS, formatYearTick } from "./chartTheme";

interface HoverDotProps {
  cx?: number;
  cy?: number;
  index?: number;
  payload?: ObservedPoint;
}

// Each point carries an SVG <title>, so browsers show the value on hover.
function renderHoverDot({ cx, cy, index, payload }: HoverDotProps): ReactElement {
  const key = `dot-${index ?? 0}`;
  if (cx === undefined || cy === undefined || !payload) {
    return <g key={key} />;
  }
  return (
    <circle key={key} cx={cx} cy={cy} r={2.5} fill={COLORS.observed} fillOpacity={0.6}>
      <title>{`${payload.label}: ${payload.y.toFixed(2)} ppm`}</title>
    </circle>
  );
}

export default function HistoryChart({ data }: { data: ObservedPoint[] }) {
  return (
    <LineChart width={CHART_WIDTH} height={CHART_HEIGHT} data={data} margin={CHART_MARGIN}>
      <CartesianGrid stroke="#e5e7eb" strokeDasharray="3 3" />
      <XAxis
        dataKey="t"
        type="number"
        scale="time"
        domain={["dataMin", "dataMax"]}
        tick={AXIS_TICK}
        tickFormatter={formatYearTick}
        label={{ value: "Date", position: "insideBottom", offset: -16 }}
      />
      <YAxis
        domain={["auto", "auto"]}
        tick={AXIS_TICK}
        label={{ value: "CO2 levels ppm", angle: -90, position: "insideLeft" }}
      />
      <Line
        type="monotone"
        dataKey="y"
        stroke={COLORS.observed}
        strokeWidth={1}
        dot={renderHoverDot}
        isAnimationActive={false}
      />
    </LineChart>
  );
}
