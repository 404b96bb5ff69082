import type {
  ChainableTableStitcher,
  ConversionProgress,
  ConversionResult,
  DocumentInput,
  DocumentMetadata,
  ExtractionMode,
  ProfileMatch,
  ProgressCallback,
  ScoreDomain,
  SegmentationStrategy,
  StrategyChoice,
  TableStitcherConfig
} from './types/index.js';
import { DEFAULT_MIN_PROFILE_CONFIDENCE, DEFAULT_VALIDATION_THRESHOLDS } from './types/index.js';
import { TableSegmenter } from './segmentation/segmenter.js';
import { createPageTables } from './segmentation/page-tables.js';
import { RoutedTables } from './segmentation/routed-tables.js';
import { TableValidator } from './validation/validator.js';
import { ValidationReport } from './validation/status.js';
import { ProfileRegistry } from './profiles/registry.js';
import { createDebugLogger } from './utils/debug.js';

const debug = createDebugLogger('stitcher');

// Convenience configuration presets
export const ConfigPresets = {
  /**
   * Score distribution reports.
   * Forces score-domain segmentation and validates the logical tables only.
   */
  distribution: {
    mode: 'logical_only',
    strategy: 'score_domain',
    validationEnabled: true,
    validationTolerance: 0.01
  },

  /**
   * Rosters and staff lists.
   * Header-repetition segmentation, page tables kept alongside for audit.
   */
  roster: {
    mode: 'hybrid',
    strategy: 'header_repetition',
    validationEnabled: true
  },

  /**
   * Half-point percent tolerance, strategy chosen per document.
   */
  strict: {
    mode: 'hybrid',
    strategy: 'auto',
    validationEnabled: true,
    validationTolerance: 0.005
  }
} satisfies Record<string, TableStitcherConfig>;

export class TableStitcher implements ChainableTableStitcher {
  private config: TableStitcherConfig;
  private profiles: ProfileRegistry;
  private segmenter: TableSegmenter;
  private validator: TableValidator;

  constructor(config: Partial<TableStitcherConfig> = {}, profiles: ProfileRegistry = new ProfileRegistry()) {
    this.config = {
      mode: 'hybrid',
      strategy: 'auto',
      validationEnabled: true,
      ...config
    };
    this.profiles = profiles;
    this.segmenter = this.buildSegmenter();
    this.validator = this.buildValidator();
  }

  getConfig(): TableStitcherConfig {
    return { ...this.config };
  }

  // Chainable configuration methods
  setMode(mode: ExtractionMode): this {
    this.config.mode = mode;
    return this;
  }

  setStrategy(strategy: StrategyChoice): this {
    this.config.strategy = strategy;
    return this;
  }

  setScoreDomains(domains: ScoreDomain[] | undefined): this {
    this.config.scoreDomains = domains ? [...domains] : undefined;
    return this;
  }

  setTolerance(tolerance: number): this {
    this.config.validationTolerance = tolerance;
    this.validator = this.buildValidator();
    return this;
  }

  enableValidation(enabled: boolean = true): this {
    this.config.validationEnabled = enabled;
    return this;
  }

  applyPreset(preset: keyof typeof ConfigPresets): this {
    const presetConfig: TableStitcherConfig = ConfigPresets[preset];
    if (!presetConfig) {
      throw new Error(`Unknown preset: ${preset}. Available presets: ${Object.keys(ConfigPresets).join(', ')}`);
    }

    // keep the caller's clock and thresholds
    this.config = {
      ...this.config,
      ...presetConfig,
      clock: this.config.clock,
      thresholds: this.config.thresholds
    };
    this.segmenter = this.buildSegmenter();
    this.validator = this.buildValidator();
    return this;
  }

  /**
   * Runs one document through profile detection, segmentation and
   * validation. Failures are caught here and reported in the result so a
   * batch can carry on.
   */
  convert(input: DocumentInput, progressCallback?: ProgressCallback): ConversionResult {
    try {
      return this.run(input, progressCallback);
    } catch (error) {
      console.error('Table conversion failed:', error);
      return {
        success: false,
        pageTables: [],
        logicalTables: [],
        tables: [],
        report: ValidationReport.failed(this.now()).toJSON(),
        metadata: { profile_confidence: 0, validation_status: 'failed', validation_issues_count: 0 },
        profile: null,
        error: error instanceof Error ? error.message : String(error)
      };
    }
  }

  /** Documents run one after another; each is finished before the next starts. */
  convertBatch(inputs: DocumentInput[], progressCallback?: ProgressCallback): ConversionResult[] {
    return inputs.map((input) => this.convert(input, progressCallback));
  }

  private run(input: DocumentInput, progressCallback?: ProgressCallback): ConversionResult {
    const fragments = input.fragments.filter((f) => f.data && f.data.length > 0);
    const pageTexts = input.pageTexts ?? [];
    const context = input.context ?? {};

    this.reportProgress(progressCallback, {
      stage: 'profiling',
      progress: 0,
      message: 'Matching document profiles...'
    });

    const match = this.profiles.detect(
      fragments,
      pageTexts,
      context,
      this.config.minProfileConfidence ?? DEFAULT_MIN_PROFILE_CONFIDENCE
    );
    const strategy = this.chooseStrategy(fragments, match);
    const domains = match?.profile.scoreDomains() ?? this.config.scoreDomains;
    debug('strategy', strategy, 'profile', match?.profile.id ?? 'none');

    this.reportProgress(progressCallback, {
      stage: 'segmenting',
      progress: 0.3,
      message: `Segmenting with ${strategy}...`
    });

    const pageTables = createPageTables(fragments);
    const segmented = this.segmenter.segment(fragments, strategy, domains);
    const logicalTables = match?.profile.postProcessTables?.(segmented) ?? segmented;
    const tables = new RoutedTables(pageTables, logicalTables).getAllTables(this.config.mode);

    this.reportProgress(progressCallback, {
      stage: 'validating',
      progress: 0.7,
      message: `Validating ${tables.length} tables...`
    });

    const report = this.config.validationEnabled
      ? this.validator.validateTables(tables)
      : new ValidationReport(this.now()).freeze();

    const metadata = this.buildMetadata(input, match);
    metadata.validation_status = report.overallStatus;
    metadata.validation_issues_count = report.issueList.length;

    this.reportProgress(progressCallback, {
      stage: 'complete',
      progress: 1,
      message: 'Conversion complete'
    });

    return {
      success: true,
      pageTables,
      logicalTables,
      tables,
      report: report.toJSON(),
      metadata,
      profile: match ? { id: match.profile.id, confidence: match.detection.confidence } : null,
      strategy,
      summary: match?.profile.summarize?.(logicalTables)
    };
  }

  private chooseStrategy(fragments: DocumentInput['fragments'], match: ProfileMatch | null): SegmentationStrategy {
    const requested = this.config.strategy ?? 'auto';
    if (requested !== 'auto') return requested;
    if (match) return match.profile.segmentationStrategy();
    return this.segmenter.resolveStrategy(fragments, 'auto');
  }

  private buildMetadata(input: DocumentInput, match: ProfileMatch | null): DocumentMetadata {
    if (!match) return { profile_confidence: 0, validation_issues_count: 0 };
    const extracted = match.profile.extractMetadata(input.fragments, input.pageTexts ?? [], input.context ?? {});
    return { ...extracted, profile_confidence: match.detection.confidence };
  }

  private buildSegmenter(): TableSegmenter {
    return new TableSegmenter({ thresholds: this.config.thresholds });
  }

  private buildValidator(): TableValidator {
    return new TableValidator({
      tolerance: this.config.validationTolerance ?? DEFAULT_VALIDATION_THRESHOLDS.tolerance,
      distributionKeywordMin: this.config.thresholds?.distributionKeywordMin,
      clock: this.config.clock
    });
  }

  private now(): Date {
    return this.config.clock ? this.config.clock() : new Date();
  }

  private reportProgress(callback: ProgressCallback | undefined, progress: ConversionProgress): void {
    if (callback) {
      callback(progress);
    }
  }
}

export * from './types/index.js';
export * from './core/index.js';
export * from './segmentation/index.js';
export * from './validation/index.js';
export * from './profiles/index.js';
export { createDebugLogger, debugEnabled } from './utils/debug.js';
