import * as fs from 'fs';
import type { ClassifierConfig } from './config/index.js';
import type { AnalysisStore } from './storage/AnalysisStore.js';
import { createAnalysisStore } from './storage/AnalysisStoreFactory.js';
import { SqliteAnalysisStore } from './storage/sqlite/SqliteAnalysisStore.js';
import { PostgresAnalysisStore } from './storage/postgres/PostgresAnalysisStore.js';
import type { OutcomeLog } from './calibration/types.js';
import { CalibrationService } from './calibration/CalibrationService.js';
import { InMemoryOutcomeLog } from './calibration/InMemoryOutcomeLog.js';
import { SqliteOutcomeLog } from './calibration/SqliteOutcomeLog.js';
import { PostgresOutcomeLog } from './calibration/PostgresOutcomeLog.js';
import type { ObservationSource } from './engine/types.js';
import { EnsembleDecisionEngine } from './engine/EnsembleDecisionEngine.js';
import { LearnedPatternSource } from './engine/sources/LearnedPatternSource.js';
import { PriorRecordSource } from './engine/sources/PriorRecordSource.js';
import { AggregatorSource } from './engine/sources/AggregatorSource.js';
import { RuleBasedSource, loadRuleSet } from './engine/sources/RuleBasedSource.js';
import { MultiRegionAggregator } from './aggregation/MultiRegionAggregator.js';
import { LocalPhotoSource } from './vision/LocalPhotoSource.js';
import { VisionModelFactory } from './vision/VisionModelFactory.js';
import { ClassificationService } from './services/ClassificationService.js';
import { logger } from './utils/logger.js';

export interface Classifier {
  service: ClassificationService;
  store: AnalysisStore;
  close(): Promise<void>;
}

function outcomeLogFor(store: AnalysisStore): OutcomeLog {
  if (store instanceof SqliteAnalysisStore) {
    return new SqliteOutcomeLog(store.database);
  }
  if (store instanceof PostgresAnalysisStore) {
    return new PostgresOutcomeLog(store.connectionManager);
  }
  logger.warn('Calibration outcomes will not survive a restart');
  return new InMemoryOutcomeLog();
}

function aggregatorSource(
  config: ClassifierConfig,
  store: AnalysisStore,
  calibration: CalibrationService
): ObservationSource | null {
  if (!config.vision.enabled) {
    logger.info('No vision model configured; photo analysis disabled');
    return null;
  }
  if (!config.photosDir || !fs.existsSync(config.photosDir)) {
    logger.info('PHOTOS_DIR not set or missing; photo analysis disabled');
    return null;
  }

  const photos = new LocalPhotoSource(config.photosDir);
  const oracle = VisionModelFactory.createFromSettings(config.vision);
  const aggregator = new MultiRegionAggregator(oracle, photos, {
    ...config.aggregator,
    fallbackMaterial: config.engine.fallback.material,
    fallbackType: config.engine.fallback.type,
  });
  logger.info(`Photo analysis enabled with ${oracle.name}`);

  return new AggregatorSource(photos, aggregator, async () =>
    calibration.promptHints(await store.listCorrections())
  );
}

/**
 * Wire store, calibration, observation sources, engine and service from configuration
 */
export async function createClassifier(config: ClassifierConfig): Promise<Classifier> {
  const store = await createAnalysisStore(config.storage, {
    material: config.engine.fallback.material,
    type: config.engine.fallback.type,
  });

  try {
    const calibration = new CalibrationService(outcomeLogFor(store));
    await calibration.load();

    const sources: ObservationSource[] = [new PriorRecordSource(), new LearnedPatternSource(store)];
    const photoSource = aggregatorSource(config, store, calibration);
    if (photoSource) {
      sources.push(photoSource);
    }
    if (config.rules.enabled) {
      sources.push(new RuleBasedSource(loadRuleSet(config.rules.path)));
    }

    const engine = new EnsembleDecisionEngine(store, sources, config.engine);
    const service = new ClassificationService(store, engine, calibration);

    logger.info('Classifier ready', { sources: sources.map(source => source.name) });

    return { service, store, close: () => store.close() };
  } catch (error) {
    await store.close();
    throw error;
  }
}
