import type { ForecastSample } from "@/lib/forecast/types";

/**
 * Presentation collaborator: turns a finished sample into the text sent to the user.
 * The only call the core makes on it. May be sync or async.
 */
export interface ReportConsumer {
  present(sample: ForecastSample, spotName: string, date: string): string | Promise<string>;
}
