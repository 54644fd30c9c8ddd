import { Injectable } from '@nestjs/common';
import { JsonLogger, LoggerFactory } from 'json-logger-service';
import { Observable, Subject } from 'rxjs';
import { RecommendationCategory } from '../recommendations/interfaces/recommendation.interface';

export interface SourceFailedEvent {
  type: 'source_failed';
  limit: number;
  error: string;
}

export interface CategoryFailedEvent {
  type: 'category_failed';
  category: RecommendationCategory;
  error: string;
}

export interface RecommendationsGeneratedEvent {
  type: 'recommendations_generated';
  poolSize: number;
  counts: Record<RecommendationCategory, number>;
}

export type DiagnosticEvent =
  | SourceFailedEvent
  | CategoryFailedEvent
  | RecommendationsGeneratedEvent;

@Injectable()
export class DiagnosticsService {
  private readonly logger: JsonLogger = LoggerFactory.createLogger(
    DiagnosticsService.name,
  );

  private readonly subject = new Subject<DiagnosticEvent>();

  get events$(): Observable<DiagnosticEvent> {
    return this.subject.asObservable();
  }

  emit(event: DiagnosticEvent): void {
    switch (event.type) {
      case 'source_failed':
        this.logger.error(' error reading opportunities ' + event.error);
        break;
      case 'category_failed':
        this.logger.error(' error generating ' + event.category + ' ' + event.error);
        break;
      default:
        this.logger.info(
          'recommendations generated from ' + event.poolSize + ' opportunities ' + JSON.stringify(event.counts),
        );
    }

    this.subject.next(event);
  }
}
