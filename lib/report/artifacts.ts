import * as fs from 'fs';
import * as path from 'path';
import { diffsToCsv, forecastToCsv, matrixToCsv, seriesToCsv } from '../csv';
import { runStage } from '../errors';
import { artifactPath } from '../paths';
import type { PipelineResult } from '../pipeline';
import { renderReportHtml } from './render';

export interface ReportArtifact {
  name: string;
  content: string;
}

/** Render every artifact in memory. Throws before anything is written. */
export function buildReportArtifacts(result: PipelineResult, generatedAt: Date = new Date()): ReportArtifact[] {
  return runStage('renderer', 'renderer', () => [
    { name: 'report.html', content: renderReportHtml(result, generatedAt) },
    { name: 'series.csv', content: seriesToCsv(result.series) },
    { name: 'forecast.csv', content: forecastToCsv(result.forecast) },
    { name: 'month-year.csv', content: matrixToCsv(result.matrix) },
    { name: 'diffs.csv', content: diffsToCsv(result.series, result.diffs) },
  ]);
}

/**
 * Write every artifact to a temp file first, then rename them all into place.
 * If any temp write fails, the temps already written are removed and the
 * directory is left as it was.
 */
export async function writeReportArtifacts(outDir: string, artifacts: ReportArtifact[]): Promise<string[]> {
  await fs.promises.mkdir(outDir, { recursive: true });

  const staged: Array<{ tempPath: string; filePath: string }> = [];
  try {
    for (const artifact of artifacts) {
      const filePath = artifactPath(outDir, artifact.name);
      const tempPath = `${filePath}.tmp`;
      staged.push({ tempPath, filePath });
      await fs.promises.writeFile(tempPath, artifact.content, 'utf-8');
    }
  } catch (error) {
    await Promise.all(staged.map(({ tempPath }) => fs.promises.rm(tempPath, { force: true })));
    throw error;
  }

  const written: string[] = [];
  for (const { tempPath, filePath } of staged) {
    await fs.promises.rename(tempPath, filePath);
    written.push(path.relative(process.cwd(), filePath) || filePath);
  }
  return written;
}
