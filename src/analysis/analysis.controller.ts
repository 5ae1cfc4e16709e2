import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { AnalysisService } from './analysis.service';
import { AnalyzeRequestDto } from './dto/analyze-request.dto';
import { createAnalysisRequest } from './analysis-request';
import type { AnalysisReport } from './interfaces/analysis.interface';

@Controller('analysis')
export class AnalysisController {
  constructor(private readonly analysisService: AnalysisService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  analyze(@Body() body: AnalyzeRequestDto): Promise<AnalysisReport> {
    return this.analysisService.analyze(createAnalysisRequest(body));
  }
}
