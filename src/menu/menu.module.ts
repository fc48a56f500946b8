import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CacheModule } from '../cache/cache.module';
import { MenuItem } from './entities';
import { MenuController } from './menu.controller';
import { MenuService } from './menu.service';

@Module({
  imports: [CacheModule, TypeOrmModule.forFeature([MenuItem])],
  controllers: [MenuController],
  providers: [MenuService],
  exports: [MenuService],
})
export class MenuModule {}
