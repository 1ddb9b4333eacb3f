import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as readline from 'readline';
import { StixObject } from '../../core/types/stix-types';
import { StixLoaderError } from '../../core/exception/custom-exceptions';
import { GRAPH_STORE, GraphStore } from '../graph-store/graph-store.interface';
import { NodesMakerService } from '../graph-mapping/nodes-maker.service';
import { RelationsMakerService } from '../graph-mapping/relations-maker.service';
import { NodeCounter } from '../graph-mapping/node-counter';
import { ParsedBundle, StixParserService } from '../stix-parser/stix-parser.service';
import { GRAPH_STORE_CONFIG_KEY, GraphStoreConfig } from '../../config/graph-store.config';
import { LOADER_CONFIG_KEY, LoaderConfig } from '../../config/loader.config';
import { IngestionRun } from './ingestion-run';
import { ResettableSource, assertReadableFile, fileSource, openZip, zipEntrySources } from './input-sources';

type Pass = 'nodes' | 'relations';

@Injectable()
export class StixFileLoaderService {
  private readonly logger = new Logger(StixFileLoaderService.name);

  constructor(
    @Inject(GRAPH_STORE) private readonly store: GraphStore,
    private readonly configService: ConfigService,
    private readonly parser: StixParserService,
    private readonly nodesMaker: NodesMakerService,
    private readonly relationsMaker: RelationsMakerService,
  ) {}

  /** One file holding one STIX bundle. */
  async loadBundleFile(inFile: string, location?: string): Promise<void> {
    await assertReadableFile(inFile);
    this.logger.log(`processing file: ${inFile}`);
    await this.withRun(location, async (run) => {
      await this.loadBundle(run, fileSource(inFile));
      this.logNodesCounter(run);
    });
  }

  /** A zip archive with one bundle per entry; ids resolve across entries. */
  async loadBundleZipFile(inFile: string, location?: string): Promise<void> {
    await assertReadableFile(inFile);
    const entries = zipEntrySources(openZip(inFile), this.entryExtensions);
    this.logger.log(`processing file: ${inFile} (${entries.length} entries)`);
    await this.withRun(location, async (run) => {
      for (const entry of entries) {
        this.logger.log(`file: ${entry.name} --> ${inFile}`);
        const before = run.context.counter.snapshot();
        await this.loadBundle(run, entry);
        this.logNodesCounter(run, { name: entry.name, counter: run.context.counter.since(before) });
      }
    });
  }

  /** A text file with one STIX object per line, read once per pass. */
  async loadLargeTextFile(inFile: string, location?: string): Promise<void> {
    await assertReadableFile(inFile);
    this.logger.log(`processing file: ${inFile}`);
    await this.withRun(location, async (run) => {
      await this.loadLines(run, fileSource(inFile));
      this.logNodesCounter(run);
    });
  }

  /** A zip archive of line-delimited entries; each entry is inflated once per pass. */
  async loadLargeZipTextFile(inFile: string, location?: string): Promise<void> {
    await assertReadableFile(inFile);
    const entries = zipEntrySources(openZip(inFile), this.entryExtensions);
    this.logger.log(`processing file: ${inFile} (${entries.length} entries)`);
    await this.withRun(location, async (run) => {
      for (const entry of entries) {
        this.logger.log(`file: ${entry.name} --> ${inFile}`);
        const before = run.context.counter.snapshot();
        await this.loadLines(run, entry);
        this.logNodesCounter(run, { name: entry.name, counter: run.context.counter.since(before) });
      }
    });
  }

  /** Counts of one archive entry, when given, then the counts of the whole run. */
  logNodesCounter(run: IngestionRun, entry?: { name: string; counter: NodeCounter }): void {
    if (entry) {
      for (const line of entry.counter.summaryLines()) {
        this.logger.log(`${entry.name} ${line}`);
      }
    }
    for (const line of run.context.counter.summaryLines()) {
      this.logger.log(line);
    }
  }

  private get defaultLocation(): string {
    return this.configService.getOrThrow<GraphStoreConfig>(GRAPH_STORE_CONFIG_KEY).uri;
  }

  private get entryExtensions(): string[] {
    return this.configService.getOrThrow<LoaderConfig>(LOADER_CONFIG_KEY).entryExtensions;
  }

  private async withRun(location: string | undefined, work: (run: IngestionRun) => Promise<void>): Promise<void> {
    const run = await IngestionRun.open(this.store, location ?? this.defaultLocation, this.nodesMaker, this.relationsMaker);
    try {
      await work(run);
    } finally {
      await run.close();
    }
  }

  private async loadBundle(run: IngestionRun, source: ResettableSource): Promise<void> {
    let bundle: ParsedBundle;
    try {
      bundle = await this.parser.parseDocument(source.open());
    } catch (error) {
      if (!(error instanceof StixLoaderError)) {
        throw error;
      }
      this.logger.error(`could not read bundle in ${source.name}: ${error.message}`);
      return;
    }
    for (const { index, error } of bundle.invalid) {
      this.logger.error(`skipping object ${index} of bundle ${bundle.id} in ${source.name}: ${error.message}`);
    }

    run.beginNodePass();
    for (const obj of bundle.objects) {
      await run.createNodes(obj);
    }
    run.beginRelationPass();
    for (const obj of bundle.objects) {
      await run.createRelations(obj);
    }
  }

  private async loadLines(run: IngestionRun, source: ResettableSource): Promise<void> {
    run.beginNodePass();
    await this.forEachObject(source, 'nodes', (obj) => run.createNodes(obj));
    run.beginRelationPass();
    await this.forEachObject(source, 'relations', (obj) => run.createRelations(obj));
  }

  private async forEachObject(
    source: ResettableSource,
    pass: Pass,
    handle: (obj: StixObject) => Promise<void>,
  ): Promise<void> {
    const lines = readline.createInterface({ input: source.open(), crlfDelay: Infinity });
    let lineNumber = 0;
    for await (const line of lines) {
      lineNumber++;
      if (line.trim().length === 0) {
        continue;
      }
      let obj: StixObject;
      try {
        obj = this.parser.parseObject(line);
      } catch (error) {
        if (!(error instanceof StixLoaderError)) {
          throw error;
        }
        // already reported during the node pass
        if (pass === 'nodes') {
          this.logger.error(`could not read STIX object in ${source.name} line ${lineNumber}: ${error.message}`);
        } else {
          this.logger.debug(`skipping ${source.name} line ${lineNumber}`);
        }
        continue;
      }
      await handle(obj);
    }
  }
}
