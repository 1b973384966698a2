import { Body, Controller, Get, HttpCode, Post, Req } from '@nestjs/common';
import type { IncomingMessage } from 'http';

import { AssessmentService, callOptionsFor } from './assessment.service';

@Controller('documents')
export class DocumentsController {
  constructor(private readonly assessmentService: AssessmentService) {}

  @Get('types')
  listTypes() {
    return { documentTypes: this.assessmentService.listDocumentTypes() };
  }

  @Post()
  @HttpCode(200)
  generate(@Body() body: unknown, @Req() request: IncomingMessage) {
    return this.assessmentService.generateDocument(body, callOptionsFor(request));
  }
}
