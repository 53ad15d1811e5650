import type { ReactElement } from "react";
import { renderToStaticMarkup } from "react-dom/server";
import ReportPage from "../../components/report/ReportPage";
import type { PipelineResult } from "../pipeline";

/** Static markup for one chart element (an <svg> inside recharts' wrapper div). */
export function renderChart(element: ReactElement): string {
  return renderToStaticMarkup(element);
}

/** Complete HTML document with every chart and the text statistics. */
export function renderReportHtml(result: PipelineResult, generatedAt: Date = new Date()): string {
  return `<!DOCTYPE html>${renderToStaticMarkup(<ReportPage result={result} generatedAt={generatedAt} />)}`;
}
