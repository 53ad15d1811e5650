import { CartesianGrid, Legend, LineChart, Line, XAxis, YAxis } from "recharts";
import type { MonthYearChartRow } from "../../lib/report/chartData";
import { AXIS_TICK, CHART_HEIGHT, CHART_MARGIN, CHART_WIDTH, yearColor } from "./chartTheme";

interface MonthYearChartProps {
  data: MonthYearChartRow[];
  years: number[];
}

export default function MonthYearChart({ data, years }: MonthYearChartProps) {
  return (
    <LineChart width={CHART_WIDTH} height={CHART_HEIGHT} data={data} margin={CHART_MARGIN}>
      <CartesianGrid stroke="#e5e7eb" strokeDasharray="3 3" />
      <XAxis
        dataKey="month"
        type="number"
        domain={[1, 12]}
        ticks={[1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]}
        tick={AXIS_TICK}
        label={{ value: "Month", position: "insideBottom", offset: -16 }}
      />
      <YAxis
        domain={["auto", "auto"]}
        tick={AXIS_TICK}
        label={{ value: "CO2 levels ppm", angle: -90, position: "insideLeft" }}
      />
      <Legend verticalAlign="top" />
      {years.map((year, i) => (
        <Line
          key={year}
          dataKey={String(year)}
          name={String(year)}
          stroke={yearColor(i, years.length)}
          strokeWidth={1}
          dot={false}
          isAnimationActive={false}
        />
      ))}
    </LineChart>
  );
}
