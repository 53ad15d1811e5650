import { CartesianGrid, ComposedChart, Legend, Line, Scatter, XAxis, YAxis } from "recharts";
import type { RegressionChartPoint } from "../../lib/report/chartData";
import { AXIS_TICK, CHART_HEIGHT, CHART_MARGIN, CHART_WIDTH, COLORS, formatYearTick } from "./chartTheme";

interface RegressionChartProps {
  data: RegressionChartPoint[];
  color: string;
}

export default function RegressionChart({ data, color }: RegressionChartProps) {
  return (
    <ComposedChart width={CHART_WIDTH} height={CHART_HEIGHT} data={data} margin={CHART_MARGIN}>
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
      <Legend verticalAlign="top" />
      <Scatter dataKey="y" name="Observed" fill={color} isAnimationActive={false} />
      <Line dataKey="fit" name="Fit" stroke={COLORS.fit} strokeWidth={1.6} dot={false} isAnimationActive={false} />
    </ComposedChart>
  );
}
