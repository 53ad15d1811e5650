import type { ReactNode } from "react";
import type { PipelineResult } from "../../lib/pipeline";
import {
  buildDiffChartData,
  buildForecastChartData,
  buildMonthYearChartData,
  buildObservedPoints,
  buildRegressionChartData,
} from "../../lib/report/chartData";
import { formatReport } from "../../lib/report/text";
import { formatDay } from "../../lib/series/calendar";
import { COLORS } from "./chartTheme";
import DiffChart from "./DiffChart";
import ForecastChart from "./ForecastChart";
import HistoryChart from "./HistoryChart";
import MonthYearChart from "./MonthYearChart";
import RegressionChart from "./RegressionChart";

const PAGE_STYLE = `
body { font-family: system-ui, sans-serif; margin: 24px auto; max-width: 960px; color: #111827; }
section { margin-bottom: 32px; }
h2 { font-size: 16px; margin-bottom: 8px; }
pre { background: #f3f4f6; padding: 12px; font-size: 12px; overflow-x: auto; }
`;

function Section({ title, children }: { title: string; children: ReactNode }) {
  return (
    <section>
      <h2>{title}</h2>
      {children}
    </section>
  );
}

interface ReportPageProps {
  result: PipelineResult;
  generatedAt: Date;
}

export default function ReportPage({ result, generatedAt }: ReportPageProps) {
  const observed = buildObservedPoints(result.series);
  const { early, late } = result.regressions;
  const horizon = result.forecast.length - result.series.length;

  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <title>{`${result.name} monthly report`}</title>
        <style>{PAGE_STYLE}</style>
      </head>
      <body>
        <h1>{`${result.name} (${result.unit}) monthly report`}</h1>
        {result.description && <p>{`Source: ${result.description}`}</p>}
        <p>{`Generated ${generatedAt.toISOString()}`}</p>

        <Section title={`Forecast (${horizon} periods ahead)`}>
          <ForecastChart forecast={buildForecastChartData(result.forecast)} observed={observed} />
        </Section>

        <Section title="Historical series (hover points for values)">
          <HistoryChart data={observed} />
        </Section>

        <Section title={`Early window ${formatDay(early.domain_start)} .. ${formatDay(early.domain_end)}`}>
          <RegressionChart data={buildRegressionChartData(result.series, early)} color={COLORS.early} />
        </Section>

        <Section title={`Late window ${formatDay(late.domain_start)} .. ${formatDay(late.domain_end)}`}>
          <RegressionChart data={buildRegressionChartData(result.series, late)} color={COLORS.late} />
        </Section>

        <Section title="Month by year">
          <MonthYearChart data={buildMonthYearChartData(result.matrix)} years={result.matrix.years} />
        </Section>

        <Section title="Monthly differences">
          <DiffChart data={buildDiffChartData(result.series, result.diffs)} />
        </Section>

        <Section title="Statistics">
          <pre>{formatReport(result)}</pre>
        </Section>
      </body>
    </html>
  );
}
