import { consoleLogger } from "./log.ts";
import type { BuildLogger } from "./log.ts";

export class BuildRequest {
  siteDir: string;
  /** Overrides the configured output directory when set. */
  destinationDir: string | undefined;
  baseURL: string | undefined;
  cleanDestinationDir: boolean;
  logger: BuildLogger;

  constructor(siteDir: string) {
    this.siteDir = siteDir;
    this.destinationDir = undefined;
    this.baseURL = undefined;
    this.cleanDestinationDir = true;
    this.logger = consoleLogger;
  }
}

export type BuildStatus = "built" | "empty";

export class BuildResult {
  readonly status: BuildStatus;
  readonly outputDir: string;
  readonly documentsBuilt: number;
  readonly listingPagesBuilt: number;
  readonly searchRecords: number;
  /** Every file the pipeline rendered, feeds included. */
  readonly pagesBuilt: number;

  constructor(
    status: BuildStatus,
    outputDir: string,
    documentsBuilt: number,
    listingPagesBuilt: number,
    searchRecords: number,
    pagesBuilt: number,
  ) {
    this.status = status;
    this.outputDir = outputDir;
    this.documentsBuilt = documentsBuilt;
    this.listingPagesBuilt = listingPagesBuilt;
    this.searchRecords = searchRecords;
    this.pagesBuilt = pagesBuilt;
  }

  static empty(outputDir: string): BuildResult {
    return new BuildResult("empty", outputDir, 0, 0, 0, 0);
  }
}
