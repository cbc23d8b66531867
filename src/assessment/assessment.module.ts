import { Module } from '@nestjs/common';
import { VerdictModule } from 'src/verdict/verdict.module';
import { AssessmentController } from './assessment.controller';
import { AssessmentPageController } from './assessment.page.controller';
import { AssessmentService } from './assessment.service';

@Module({
  imports: [VerdictModule],
  controllers: [AssessmentController, AssessmentPageController],
  providers: [AssessmentService],
})
export class AssessmentModule {}
