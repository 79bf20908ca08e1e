import { serializeBatchReportToJson, serializeBatchReportToNdjson } from "../check-output";
import type { BatchReport, CheckOutputFormat } from "../domain";
import { serializeBatchReportToPrometheusTextfile } from "../prometheus-textfile";
import { renderTextReport } from "../text-report";

export function renderBatchReport(report: BatchReport, format: CheckOutputFormat): string {
  switch (format) {
    case "text":
      return renderTextReport(report);
    case "json":
      return serializeBatchReportToJson(report);
    case "ndjson":
      return serializeBatchReportToNdjson(report);
    case "prometheus":
      return serializeBatchReportToPrometheusTextfile(report);
    default: {
      const exhaustiveCheck: never = format;
      return exhaustiveCheck;
    }
  }
}
