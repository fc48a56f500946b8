import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { MenuItem } from '../menu/entities';
import { Order, OrderItem } from '../order/entities';
import { RecommendationController } from './recommendation.controller';
import { RecommendationService } from './recommendation.service';

@Module({
  imports: [CacheModule, TypeOrmModule.forFeature([MenuItem, Order, OrderItem])],
  controllers: [RecommendationController],
  providers: [RecommendationService],
})
export class RecommendationModule {}
