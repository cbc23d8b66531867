import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { AppController } from './app.controller';
import { FormsModule } from './forms/forms.module';
import { AssessmentModule } from './assessment/assessment.module';
import { validateEnv } from './config/env.validation';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: process.env.NODE_ENV === 'prod' ? '.env.prod' : '.env',
      validate: validateEnv,
    }),
    FormsModule,
    AssessmentModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
