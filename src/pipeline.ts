import { Buffer } from 'node:buffer';
import diagnosticsChannel from 'node:diagnostics_channel';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { performance } from 'node:perf_hooks';

import { type CheerioAPI, load } from 'cheerio';
import { z } from 'zod';

import { config, type SerializationMode } from './config.js';
import {
  type ContentExtractionEngine,
  DEFAULT_ENGINES,
  extractMainContent,
} from './content-extractor.js';
import { normalizeDocument } from './dom-normalizer.js';
import {
  InputValidationError,
  InvalidOptionsError,
  StageError,
  getErrorMessage,
} from './errors.js';
import { fetchImage as httpFetchImage, type ImageFetcher } from './fetch.js';
import { rebuildHead } from './head-rebuilder.js';
import { extractImages, type ImageExtractionReport } from './images.js';
import { getRunId, logDebug, logError, logInfo } from './observability.js';
import { ResourceStore } from './resource-store.js';
import { classifyDocument } from './semantic-classifier.js';
import { serializeDocument } from './serializer.js';
import {
  extractCssEmbeddedImages,
  extractStyles,
  optimizeCss,
} from './styles.js';
import { validateInputFile } from './validation.js';

/* -------------------------------------------------------------------------------------------------
 * Contexts
 * ------------------------------------------------------------------------------------------------- */

export interface OutputLayout {
  readonly root: string;
  readonly htmlFile: string;
  readonly stylesDir: string;
  readonly cssFile: string;
  readonly imagesDir: string;
}

export interface OutputManifest {
  readonly htmlFile: string;
  readonly cssFile: string;
  readonly imagesDir: string;
}

export interface PipelineInput {
  readonly inputPath: string;
  readonly layout: OutputLayout;
  readonly mode: SerializationMode;
}

export interface LoadedContext extends PipelineInput {
  readonly html: string;
  readonly $: CheerioAPI;
}

export interface ExtractedContext extends LoadedContext {
  readonly css: string;
  readonly images: ImageExtractionReport;
}

export interface CompletedContext extends ExtractedContext {
  readonly output: OutputManifest;
}

export function resolveOutputLayout(outputDir: string): OutputLayout {
  const root = path.resolve(outputDir);
  const stylesDir = path.join(root, 'styles');
  return {
    root,
    htmlFile: path.join(root, 'index.html'),
    stylesDir,
    cssFile: path.join(stylesDir, 'styles.css'),
    imagesDir: path.join(root, 'images'),
  };
}

async function prepareOutputDirectories(layout: OutputLayout): Promise<void> {
  await mkdir(layout.stylesDir, { recursive: true });
  await mkdir(layout.imagesDir, { recursive: true });
}

/* -------------------------------------------------------------------------------------------------
 * Stage tracking
 * ------------------------------------------------------------------------------------------------- */

export const STAGE_CHANNEL_NAME = 'html-refiner.stage';

export interface StageEvent {
  readonly v: 1;
  readonly type: 'stage';
  readonly stage: string;
  readonly durationMs: number;
  readonly ok: boolean;
  readonly runId?: string;
}

class StageTracker {
  private readonly channel = diagnosticsChannel.channel(STAGE_CHANNEL_NAME);

  async run<T>(stage: string, fn: () => Promise<T>): Promise<T> {
    const startTime = performance.now();
    let ok = false;
    try {
      const result = await fn();
      ok = true;
      return result;
    } finally {
      this.end(stage, performance.now() - startTime, ok);
    }
  }

  private end(stage: string, durationMs: number, ok: boolean): void {
    const runId = getRunId();
    const event: StageEvent = {
      v: 1,
      type: 'stage',
      stage,
      durationMs,
      ok,
      ...(runId ? { runId } : {}),
    };
    logDebug('Stage finished', {
      stage,
      ok,
      durationMs: Math.round(durationMs),
    });
    this.publish(event);
  }

  private publish(event: StageEvent): void {
    if (!this.channel.hasSubscribers) return;
    try {
      this.channel.publish(event);
    } catch (error: unknown) {
      logDebug('Stage event subscriber failed', {
        error: getErrorMessage(error),
      });
    }
  }
}

const stageTracker = new StageTracker();

/* -------------------------------------------------------------------------------------------------
 * Pipeline
 * ------------------------------------------------------------------------------------------------- */

export interface PipelineStage<I, O> {
  readonly name: string;
  process(context: I): Promise<O> | O;
}

function isPassThroughError(error: unknown): boolean {
  return error instanceof InputValidationError || error instanceof StageError;
}

async function runStage<I, O>(stage: PipelineStage<I, O>, context: I): Promise<O> {
  try {
    return await stageTracker.run(stage.name, async () =>
      stage.process(context)
    );
  } catch (error: unknown) {
    logError(`Stage ${stage.name} failed`, {
      stage: stage.name,
      error: getErrorMessage(error),
    });
    if (isPassThroughError(error)) throw error;
    throw new StageError(stage.name, error);
  }
}

/**
 * An ordered chain of stages. Each `pipe` returns a new pipeline whose output
 * type is the appended stage's output, so stages can only be chained onto
 * one that produces what they consume.
 */
export class Pipeline<I, O> {
  private constructor(
    private readonly run: (input: I) => Promise<O>,
    readonly stageNames: readonly string[]
  ) {}

  static start<T>(): Pipeline<T, T> {
    return new Pipeline<T, T>(async (input) => input, []);
  }

  pipe<N>(stage: PipelineStage<O, N>): Pipeline<I, N> {
    const previous = this.run;
    return new Pipeline<I, N>(
      async (input) => runStage(stage, await previous(input)),
      [...this.stageNames, stage.name]
    );
  }

  async execute(input: I): Promise<O> {
    return this.run(input);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Stages
 * ------------------------------------------------------------------------------------------------- */

export class ValidationStage implements PipelineStage<PipelineInput, PipelineInput> {
  readonly name = 'validation';

  constructor(private readonly maxFileBytes: number) {}

  async process(context: PipelineInput): Promise<PipelineInput> {
    const validated = await validateInputFile(
      context.inputPath,
      this.maxFileBytes
    );
    return { ...context, inputPath: validated.inputPath };
  }
}

export class LoadingStage implements PipelineStage<PipelineInput, LoadedContext> {
  readonly name = 'loading';

  async process(context: PipelineInput): Promise<LoadedContext> {
    const html = await readFile(context.inputPath, 'utf8');
    logInfo('Input loaded', { bytes: Buffer.byteLength(html) });
    return { ...context, html, $: load(html) };
  }
}

export class ContentExtractionStage
  implements PipelineStage<LoadedContext, LoadedContext>
{
  readonly name = 'content-extraction';

  constructor(
    private readonly engines: readonly ContentExtractionEngine[] = DEFAULT_ENGINES
  ) {}

  process(context: LoadedContext): LoadedContext {
    const fragment = extractMainContent(context.html, this.engines);
    if (fragment === null) {
      logInfo('No main content found, keeping full body');
      return context;
    }
    context.$('body').first().empty().append(fragment);
    return { ...context };
  }
}

export class CleaningStage implements PipelineStage<LoadedContext, LoadedContext> {
  readonly name = 'cleaning';

  process(context: LoadedContext): LoadedContext {
    normalizeDocument(context.$);
    classifyDocument(context.$);
    rebuildHead(context.$);
    return { ...context };
  }
}

export interface ExtractionDeps {
  readonly fetchImage: ImageFetcher;
  readonly maxImageBytes: number;
  readonly concurrency: number;
}

export class ExtractionStage
  implements PipelineStage<LoadedContext, ExtractedContext>
{
  readonly name = 'extraction';

  constructor(private readonly deps: ExtractionDeps) {}

  async process(context: LoadedContext): Promise<ExtractedContext> {
    await prepareOutputDirectories(context.layout);
    const store = new ResourceStore(context.layout.imagesDir);

    const css = await extractCssEmbeddedImages(extractStyles(context.$), store);
    const images = await extractImages(context.$, { ...this.deps, store });
    return { ...context, css, images };
  }
}

export class OptimizationStage
  implements PipelineStage<ExtractedContext, ExtractedContext>
{
  readonly name = 'optimization';

  process(context: ExtractedContext): ExtractedContext {
    return { ...context, css: optimizeCss(context.css) };
  }
}

export class OutputStage
  implements PipelineStage<ExtractedContext, CompletedContext>
{
  readonly name = 'output';

  async process(context: ExtractedContext): Promise<CompletedContext> {
    const { layout } = context;
    await writeFile(layout.cssFile, context.css, 'utf8');
    const html = await serializeDocument(context.$, context.mode);
    await writeFile(layout.htmlFile, html, 'utf8');

    const output: OutputManifest = Object.freeze({
      htmlFile: layout.htmlFile,
      cssFile: layout.cssFile,
      imagesDir: layout.imagesDir,
    });
    return { ...context, output };
  }
}

/* -------------------------------------------------------------------------------------------------
 * Composition
 * ------------------------------------------------------------------------------------------------- */

export interface DefaultPipelineOptions extends ExtractionDeps {
  readonly extractMainContent: boolean;
  readonly maxFileBytes: number;
  readonly engines?: readonly ContentExtractionEngine[];
}

export function createDefaultPipeline(
  options: DefaultPipelineOptions
): Pipeline<PipelineInput, CompletedContext> {
  const loaded = Pipeline.start<PipelineInput>()
    .pipe(new ValidationStage(options.maxFileBytes))
    .pipe(new LoadingStage());

  const focused = options.extractMainContent
    ? loaded.pipe(new ContentExtractionStage(options.engines))
    : loaded;

  return focused
    .pipe(new CleaningStage())
    .pipe(
      new ExtractionStage({
        fetchImage: options.fetchImage,
        maxImageBytes: options.maxImageBytes,
        concurrency: options.concurrency,
      })
    )
    .pipe(new OptimizationStage())
    .pipe(new OutputStage());
}

const processOptionsSchema = z
  .object({
    inputPath: z.string().min(1),
    outputDir: z.string().min(1).optional(),
    mode: z.enum(['readable', 'minified']).optional(),
    extractMainContent: z.boolean().optional(),
    maxFileBytes: z.number().int().positive().optional(),
    maxImageBytes: z.number().int().positive().optional(),
    concurrency: z.number().int().min(1).max(10).optional(),
    fetchImage: z
      .custom<ImageFetcher>((value) => typeof value === 'function', {
        message: 'fetchImage must be a function',
      })
      .optional(),
  })
  .strict();

export type ProcessOptions = z.input<typeof processOptionsSchema>;

function parseProcessOptions(
  options: ProcessOptions
): z.output<typeof processOptionsSchema> {
  const parsed = processOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new InvalidOptionsError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || 'options'}: ${issue.message}`
      )
    );
  }
  return parsed.data;
}

/**
 * Refines one HTML file into `<outputDir>/index.html`,
 * `<outputDir>/styles/styles.css` and `<outputDir>/images/`. Options left out
 * fall back to the environment configuration.
 */
export async function processHtmlFile(
  options: ProcessOptions
): Promise<OutputManifest> {
  const parsed = parseProcessOptions(options);

  const pipeline = createDefaultPipeline({
    extractMainContent:
      parsed.extractMainContent ?? config.extraction.extractMainContent,
    maxFileBytes: parsed.maxFileBytes ?? config.input.maxFileBytes,
    maxImageBytes: parsed.maxImageBytes ?? config.fetcher.maxImageBytes,
    concurrency: parsed.concurrency ?? config.fetcher.concurrency,
    fetchImage: parsed.fetchImage ?? httpFetchImage,
  });

  logInfo('Processing started', {
    inputPath: parsed.inputPath,
    stages: pipeline.stageNames,
  });

  const { output } = await pipeline.execute({
    inputPath: parsed.inputPath,
    layout: resolveOutputLayout(parsed.outputDir ?? config.output.dir),
    mode: parsed.mode ?? config.output.mode,
  });

  logInfo('Processing finished', { ...output });
  return output;
}
