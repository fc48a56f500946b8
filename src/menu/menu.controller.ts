import {
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Query,
  StreamableFile,
} from '@nestjs/common';
import { IResponse } from '../shared/interfaces';
import { GetMenuDto } from './dto';
import { IMAGE_CONTENT_TYPE } from './helpers';
import {
  ICategoriesResponse,
  IMenuItemResponse,
  IMenuResponse,
} from './interfaces';
import { MenuService } from './menu.service';

@Controller('menu')
export class MenuController {
  constructor(private readonly menuService: MenuService) {}

  @Get()
  async getMenu(@Query() getMenuDto: GetMenuDto): Promise<IMenuResponse> {
    return this.menuService.getMenu(getMenuDto);
  }

  @Get('categories')
  async getCategories(): Promise<ICategoriesResponse> {
    return this.menuService.getCategories();
  }

  @Get(':id')
  async getMenuItem(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<IMenuItemResponse> {
    return this.menuService.getMenuItem(id);
  }

  @Get(':id/image')
  async getMenuItemImage(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<StreamableFile | IResponse> {
    const { status, message, image } =
      await this.menuService.getMenuItemImage(id);
    if (!image) {
      return { status, message };
    }
    return new StreamableFile(image, { type: IMAGE_CONTENT_TYPE });
  }
}
