import { expect } from 'chai';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  AnalyticsDatabase,
  AnalyticsError,
  MissingInputError,
  StageFailedError,
  TABLES,
} from '@shopper-insights/shared';
import { PipelineRunner, STAGE_NAMES, getStage, runPipeline } from '../src/services/PipelineRunner';
import { StageDefinition } from '../src/types';
import { captureError, openTestDatabase, seed, testSettings, THREE_USER_EVENTS } from './helpers';

describe('PipelineRunner', () => {
  let db: AnalyticsDatabase;

  beforeEach(async () => {
    db = await openTestDatabase();
  });

  afterEach(async () => {
    await db.close();
  });

  it('should register stages in dependency order', () => {
    expect(STAGE_NAMES).to.deep.equal([
      'ingest',
      'dimensions',
      'sessions',
      'daily-kpis',
      'rfm',
      'retention',
      'affinity',
      'features',
      'propensity-dataset',
    ]);
  });

  it('should run requested stages in registry order and report row counts', async () => {
    await seed(db, THREE_USER_EVENTS);

    const result = await runPipeline(db, testSettings(), ['sessions', 'dimensions']);

    expect(result.stages.map((stage) => stage.stage)).to.deep.equal(['dimensions', 'sessions']);
    expect(result.stages[0].rowCounts).to.deep.equal({ [TABLES.DIM_PRODUCTS]: 3, [TABLES.DIM_USERS]: 3 });
    expect(result.stages[1].rowCounts).to.deep.equal({ [TABLES.FACT_SESSIONS]: 4 });
  });

  it('should abort with MissingInputError when an upstream table is absent', async () => {
    const error = await captureError(() => runPipeline(db, testSettings(), ['dimensions']));

    expect(error).to.be.instanceOf(MissingInputError);
    if (error instanceof MissingInputError) {
      expect(error.input).to.equal(TABLES.EVENTS);
      expect(error.context).to.deep.include({ stage: 'dimensions' });
    }
    expect(await db.tableExists(TABLES.DIM_USERS)).to.equal(false);
  });

  it('should stop at the first failing stage and wrap its error', async () => {
    const ran: string[] = [];
    const stage = (name: StageDefinition['name'], fail = false): StageDefinition => ({
      name,
      description: name,
      requires: [],
      produces: [],
      run: async () => {
        ran.push(name);
        if (fail) {
          throw new Error('disk full');
        }
      },
    });
    const runner = new PipelineRunner(db, testSettings(), [stage('ingest'), stage('dimensions', true), stage('sessions')]);

    const error = await captureError(() => runner.run());

    expect(ran).to.deep.equal(['ingest', 'dimensions']);
    expect(error).to.be.instanceOf(StageFailedError);
    if (error instanceof StageFailedError) {
      expect(error.stage).to.equal('dimensions');
      expect(error.message).to.equal("Stage 'dimensions' failed: disk full");
      expect(error.cause).to.be.instanceOf(Error);
    }
  });

  it('should reject unknown stage names', async () => {
    expect(() => getStage('nope')).to.throw(AnalyticsError, /Unknown stage 'nope'/);
    const error = await captureError(() => runPipeline(db, testSettings(), ['nope']));
    expect(error).to.be.instanceOf(AnalyticsError);
  });

  it('should refuse an invalid memory ceiling before running anything', async () => {
    await seed(db, THREE_USER_EVENTS);

    const error = await captureError(() => runPipeline(db, testSettings({ memoryLimit: 'lots' }), ['dimensions']));

    expect(error).to.be.instanceOf(AnalyticsError);
    if (error instanceof AnalyticsError) {
      expect(error.code).to.equal('INVALID_SETTING');
    }
    expect(await db.tableExists(TABLES.DIM_USERS)).to.equal(false);
  });

  it('should run the whole pipeline from a CSV export', async () => {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'shopper-insights-'));
    try {
      const source = path.join(workDir, 'events.csv');
      await fs.writeFile(
        source,
        [
          'event_time,event_type,product_id,category_id,category_code,brand,price,user_id,user_session',
          '2024-01-01 10:00:00 UTC,view,1,10,kitchen.kettle,acme,20.00,1,a',
          '2024-01-01 10:01:00 UTC,cart,1,10,kitchen.kettle,acme,20.00,1,a',
          '2024-01-01 10:02:00 UTC,purchase,1,10,kitchen.kettle,acme,20.00,1,a',
          '2024-01-01 10:02:00 UTC,purchase,2,10,kitchen.mug,acme,5.00,1,a',
          '2024-01-09 09:00:00 UTC,purchase,1,10,kitchen.kettle,acme,22.00,2,b',
          '2024-01-09 09:00:30 UTC,purchase,2,10,kitchen.mug,acme,5.00,2,b',
          '2024-02-03 12:00:00 UTC,view,3,11,,,,3,c',
        ].join('\n')
      );

      const result = await runPipeline(db, testSettings({ rawEventsPath: source }));

      expect(result.stages.map((stage) => stage.stage)).to.deep.equal([...STAGE_NAMES]);
      expect(result.stages[0].rowCounts).to.deep.equal({ [TABLES.EVENTS]: 7 });
      for (const table of Object.values(TABLES)) {
        expect(await db.tableExists(table), table).to.equal(true);
      }
      expect(await db.rowCount(TABLES.RFM_SEGMENTS)).to.equal(2);
      expect(await db.rowCount(TABLES.FEATURES_USERS)).to.equal(3);
      expect(await db.rowCount(TABLES.PRODUCT_AFFINITY)).to.equal(1);
    } finally {
      await fs.rm(workDir, { recursive: true, force: true });
    }
  });
});
