import { Module } from '@nestjs/common';
import { ArithmeticController } from './arithmetic.controller';

@Module({
  controllers: [ArithmeticController],
})
export class ArithmeticModule {}
