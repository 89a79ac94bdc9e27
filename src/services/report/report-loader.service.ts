import { logger } from '../../lib/logger';
import { AppError } from '../../utils/app-error';
import { readTextFile } from '../../utils/file-helpers';
import { ResearchReport, researchReportSchema } from '../../schemas/report.schemas';

class ReportLoaderService {
  async loadReport(jsonPath: string): Promise<ResearchReport> {
    const raw = await readTextFile(jsonPath);
    return this.parseReport(raw, jsonPath);
  }

  parseReport(raw: string, source: string = 'report'): ResearchReport {
    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw AppError.unprocessable(`${source} is not valid JSON: ${reason}`);
    }

    const result = researchReportSchema.safeParse(data);
    if (!result.success) {
      const issues = result.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw AppError.unprocessable(`${source} is not a valid research report: ${issues}`);
    }

    logger.debug(`[Report Loader] Loaded ${source} with ${result.data.sections?.length ?? 0} sections`);
    return result.data;
  }
}

export const reportLoaderService = new ReportLoaderService();
