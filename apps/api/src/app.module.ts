import { Module } from '@nestjs/common';
import { APP_INTERCEPTOR } from '@nestjs/core';

import { AssessmentOrchestrator } from '@juridico/assessment';
import { LegalContentLibrary } from '@juridico/rules';

import { AssessmentService } from './assessments/assessment.service';
import { AssessmentsController } from './assessments/assessments.controller';
import { DocumentsController } from './assessments/documents.controller';
import { APP_CONFIG, loadConfig, type AppConfig } from './config';
import { HealthController } from './health.controller';
import { LoggingInterceptor } from './observability/logging.interceptor';
import { StructuredLoggerService } from './observability/structured-logger.service';

@Module({
  controllers: [HealthController, DocumentsController, AssessmentsController],
  providers: [
    { provide: APP_CONFIG, useFactory: () => loadConfig() },
    {
      provide: StructuredLoggerService,
      useFactory: (config: AppConfig) => new StructuredLoggerService(config.logLevel),
      inject: [APP_CONFIG]
    },
    {
      provide: AssessmentOrchestrator,
      useFactory: (config: AppConfig) =>
        new AssessmentOrchestrator({
          library: new LegalContentLibrary({
            basePath: config.legalContentDir,
            disabledAreas: config.disabledAreas,
            disabledDocumentTypes: config.disabledDocumentTypes
          })
        }),
      inject: [APP_CONFIG]
    },
    AssessmentService,
    {
      provide: APP_INTERCEPTOR,
      useClass: LoggingInterceptor
    }
  ]
})
export class AppModule {}
