import { Body, Controller, HttpCode, Post, Req } from '@nestjs/common';
import type { IncomingMessage } from 'http';

import { AssessmentService, callOptionsFor } from './assessment.service';

@Controller('assessments')
export class AssessmentsController {
  constructor(private readonly assessmentService: AssessmentService) {}

  @Post('case')
  @HttpCode(200)
  analyzeCase(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.analyzeCase(body, callOptionsFor(request));
  }

  @Post('classification')
  @HttpCode(200)
  classifyCase(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.classifyCase(body, callOptionsFor(request));
  }

  @Post('constitutional-rights')
  @HttpCode(200)
  checkConstitutionalRights(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.checkConstitutionalRights(body, callOptionsFor(request));
  }

  @Post('contract-validity')
  @HttpCode(200)
  analyzeContractValidity(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.analyzeContractValidity(body, callOptionsFor(request));
  }

  @Post('criminal-liability')
  @HttpCode(200)
  assessCriminalLiability(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.assessCriminalLiability(body, callOptionsFor(request));
  }
}
