import { TraceService } from '../../../services/core/TraceService';
import { Logger } from '../../../services/core/Logger';

describe('TraceService', () => {
  let traceService: TraceService;

  beforeEach(() => {
    traceService = new TraceService(new Logger('TraceServiceTest'));
  });

  describe('generateRunId', () => {
    it('should generate unique run IDs', () => {
      const runId1 = traceService.generateRunId();
      const runId2 = traceService.generateRunId();

      expect(runId1).not.toBe(runId2);
      expect(runId1).toMatch(/^upload-\d+-[a-f0-9-]+$/);
    });
  });

  describe('createContext', () => {
    it('should create a context with a fresh run ID and the database', () => {
      const context = traceService.createContext('movies');

      expect(context.database).toBe('movies');
      expect(context.runId).toMatch(/^upload-/);
    });

    it('should reuse an existing run ID', () => {
      expect(traceService.createContext(undefined, 'upload-given')).toEqual({ runId: 'upload-given' });
    });
  });
});
