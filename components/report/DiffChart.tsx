import { CartesianGrid, LineChart, Line, ReferenceLine, XAxis, YAxis } from "recharts";
import type { DiffChartPoint } from "../../lib/report/chartData";
import { AXIS_TICK, CHART_HEIGHT, CHART_MARGIN, CHART_WIDTH, COLORS, formatYearTick } from "./chartTheme";

export default function DiffChart({ data }: { data: DiffChartPoint[] }) {
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
        tick={AXIS_TICK}
        label={{ value: "Monthly change ppm", angle: -90, position: "insideLeft" }}
      />
      <ReferenceLine y={0} stroke={COLORS.zero} strokeDasharray="4 4" />
      <Line type="linear" dataKey="diff" stroke={COLORS.diff} strokeWidth={1} dot={false} isAnimationActive={false} />
    </LineChart>
  );
}
