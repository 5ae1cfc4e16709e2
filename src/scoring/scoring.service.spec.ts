import { Test, TestingModule } from '@nestjs/testing';
import { ScoringService } from './scoring.service';
import { SimpleScoringStrategy } from './strategies/simple.strategy';
import { AdvancedScoringStrategy } from './strategies/advanced.strategy';
import {
  AnalysisResult,
  BudgetStatus,
  ScoringContext,
  ScoringMode,
} from './interfaces/scoring.interface';

describe('ScoringService', () => {
  let service: ScoringService;

  const simpleResult: AnalysisResult = {
    score: 64,
    status: BudgetStatus.YELLOW,
    reasoning: 'Stable company.',
    evidence: ['Steady headcount'],
    recommendation: 'Nurture.',
    email_draft: 'Hi there...',
  };
  const advancedResult: AnalysisResult = { ...simpleResult, score: 71, status: BudgetStatus.GREEN };

  const mockSimple = { score: jest.fn() };
  const mockAdvanced = { score: jest.fn() };

  const context: ScoringContext = {
    domain: 'acme.io',
    company: { name: 'Acme' },
    signals: null,
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    mockSimple.score.mockResolvedValue(simpleResult);
    mockAdvanced.score.mockResolvedValue(advancedResult);

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        ScoringService,
        { provide: SimpleScoringStrategy, useValue: mockSimple },
        { provide: AdvancedScoringStrategy, useValue: mockAdvanced },
      ],
    }).compile();

    service = module.get<ScoringService>(ScoringService);
  });

  it('should dispatch simple mode to the simple strategy only', async () => {
    const result = await service.score(ScoringMode.SIMPLE, context, 'test-llm-key');

    expect(result).toBe(simpleResult);
    expect(mockSimple.score).toHaveBeenCalledWith(context, 'test-llm-key');
    expect(mockAdvanced.score).not.toHaveBeenCalled();
  });

  it('should dispatch advanced mode to the advanced strategy only', async () => {
    const result = await service.score(ScoringMode.ADVANCED, context, 'test-llm-key');

    expect(result).toBe(advancedResult);
    expect(mockAdvanced.score).toHaveBeenCalledWith(context, 'test-llm-key');
    expect(mockSimple.score).not.toHaveBeenCalled();
  });

  it('should not fall back to the other strategy when one fails', async () => {
    mockAdvanced.score.mockRejectedValue(new Error('stage failed'));

    await expect(
      service.score(ScoringMode.ADVANCED, context, 'test-llm-key'),
    ).rejects.toThrow('stage failed');
    expect(mockSimple.score).not.toHaveBeenCalled();
  });
});
