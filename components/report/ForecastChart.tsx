import { Area, CartesianGrid, ComposedChart, Legend, Line, Scatter, XAxis, YAxis } from "recharts";
import type { ForecastChartPoint, ObservedPoint } from "../../lib/report/chartData";
import { AXIS_TICK, CHART_HEIGHT, CHART_MARGIN, CHART_WIDTH, COLORS, formatYearTick } from "./chartTheme";

interface ForecastChartProps {
  forecast: ForecastChartPoint[];
  observed: ObservedPoint[];
}

export default function ForecastChart({ forecast, observed }: ForecastChartProps) {
  return (
    <ComposedChart width={CHART_WIDTH} height={CHART_HEIGHT} data={forecast} margin={CHART_MARGIN}>
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
        tickFormatter={(v: number) => v.toFixed(0)}
        label={{ value: "CO2 levels ppm", angle: -90, position: "insideLeft" }}
      />
      <Legend verticalAlign="top" />
      <Area
        dataKey="band"
        name="Interval"
        stroke="none"
        fill={COLORS.band}
        fillOpacity={0.4}
        isAnimationActive={false}
      />
      <Line
        dataKey="yhat"
        name="Forecast"
        stroke={COLORS.forecast}
        strokeWidth={1.4}
        dot={false}
        isAnimationActive={false}
      />
      <Scatter data={observed} dataKey="y" name="Observed" fill={COLORS.observed} shape="circle" isAnimationActive={false} />
    </ComposedChart>
  );
}
