import { HttpStatus, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { InjectDataSource, InjectRepository } from '@nestjs/typeorm';
import { promises as fs } from 'fs';
import * as path from 'path';
import { DataSource, QueryRunner, Repository } from 'typeorm';
import { CacheService } from '../cache/cache.service';
import { CartItem } from '../cart/entities';
import {
  ALL_CATEGORIES,
  MENU_CATEGORIES,
  POPULAR_ITEMS_CACHE_PREFIX,
} from '../constants';
import { errorMessage, isFileNotFoundError } from '../shared/helpers';
import { CreateMenuItemDto, GetMenuDto } from './dto';
import { MenuItem } from './entities';
import {
  InvalidImageError,
  calculateTotalPages,
  dishImageFileName,
  isAllowedImageFile,
  normalizeDishImage,
  toMenuItemView,
} from './helpers';
import {
  ICategoriesResponse,
  IMenuItemImageResponse,
  IMenuItemResponse,
  IMenuResponse,
} from './interfaces';

const DEFAULT_RATING = 4;

@Injectable()
export class MenuService {
  private readonly logger = new Logger('MenuService');
  private readonly imagesDir: string;
  private readonly pageSize: number;

  constructor(
    @InjectRepository(MenuItem)
    private menuItemRepository: Repository<MenuItem>,
    @InjectDataSource()
    private dataSource: DataSource,
    private cacheService: CacheService,
    configService: ConfigService,
  ) {
    this.imagesDir = path.resolve(
      configService.get<string>('IMAGES_DIR', 'images'),
    );
    this.pageSize = configService.get<number>('MENU_PAGE_SIZE', 6);
  }

  async getMenu(getMenuDto: GetMenuDto): Promise<IMenuResponse> {
    const { category = ALL_CATEGORIES, page = 1 } = getMenuDto;
    try {
      const [menuItems, totalItems] =
        await this.menuItemRepository.findAndCount({
          where: category === ALL_CATEGORIES ? {} : { category },
          order: { id: 'ASC' },
          skip: (page - 1) * this.pageSize,
          take: this.pageSize,
        });
      return {
        status: HttpStatus.OK,
        message: 'Menu fetched successfully',
        category,
        items: menuItems.map(toMenuItemView),
        page,
        totalPages: calculateTotalPages(totalItems, this.pageSize),
        totalItems,
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        category,
        items: [],
        page,
        totalPages: 1,
        totalItems: 0,
      };
    }
  }

  async getCategories(): Promise<ICategoriesResponse> {
    try {
      const rows = await this.menuItemRepository
        .createQueryBuilder('menuItem')
        .select('DISTINCT menuItem.category', 'category')
        .getRawMany<{ category: string }>();
      const categories = rows.map(({ category }) => category).sort();
      return {
        status: HttpStatus.OK,
        message: 'Categories fetched successfully',
        categories: [ALL_CATEGORIES, ...categories],
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        categories: [],
      };
    }
  }

  async getMenuItem(menuItemId: number): Promise<IMenuItemResponse> {
    try {
      const menuItem = await this.menuItemRepository.findOneBy({
        id: menuItemId,
      });
      if (!menuItem) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Menu item not found',
          item: null,
        };
      }
      return {
        status: HttpStatus.OK,
        message: 'Menu item fetched successfully',
        item: toMenuItemView(menuItem),
      };
    } catch (error) {
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        item: null,
      };
    }
  }

  async getMenuItemImage(menuItemId: number): Promise<IMenuItemImageResponse> {
    try {
      const menuItem = await this.menuItemRepository.findOneBy({
        id: menuItemId,
      });
      if (!menuItem?.imageFile) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Image not found',
          image: null,
        };
      }
      const image = await fs.readFile(
        path.join(this.imagesDir, menuItem.imageFile),
      );
      return {
        status: HttpStatus.OK,
        message: 'Image fetched successfully',
        image,
      };
    } catch (error) {
      if (isFileNotFoundError(error)) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Image not found',
          image: null,
        };
      }
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        image: null,
      };
    }
  }

  async addMenuItem(
    createMenuItemDto: CreateMenuItemDto,
    image?: Express.Multer.File,
  ): Promise<IMenuItemResponse> {
    const name = createMenuItemDto.name?.trim() ?? '';
    const price = createMenuItemDto.price ?? 0;
    if (!name || price <= 0) {
      return {
        status: HttpStatus.BAD_REQUEST,
        message: 'Fill required fields',
        item: null,
      };
    }
    if (image && !isAllowedImageFile(image.originalname)) {
      return {
        status: HttpStatus.BAD_REQUEST,
        message: 'Image must be a png, jpg or jpeg file',
        item: null,
      };
    }

    let queryRunner: QueryRunner | undefined;
    try {
      const imageData = image ? await normalizeDishImage(image.buffer) : null;

      queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();

      const menuItem = queryRunner.manager.create(MenuItem, {
        name,
        price,
        rating: createMenuItemDto.rating ?? DEFAULT_RATING,
        category: createMenuItemDto.category ?? MENU_CATEGORIES[0],
        tags: createMenuItemDto.tags ?? [],
        imageFile: null,
      });
      await queryRunner.manager.save(MenuItem, menuItem);

      if (imageData) {
        menuItem.imageFile = dishImageFileName(menuItem.id);
        await fs.mkdir(this.imagesDir, { recursive: true });
        await fs.writeFile(
          path.join(this.imagesDir, menuItem.imageFile),
          imageData,
        );
        await queryRunner.manager.save(MenuItem, menuItem);
      }

      await queryRunner.commitTransaction();
      this.cacheService.delByPrefix(POPULAR_ITEMS_CACHE_PREFIX);
      this.logger.log(menuItem.id, `dish added: ${name}`);
      return {
        status: HttpStatus.CREATED,
        message: `Added ${name}`,
        item: toMenuItemView(menuItem),
      };
    } catch (error) {
      if (queryRunner?.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      if (error instanceof InvalidImageError) {
        return {
          status: HttpStatus.BAD_REQUEST,
          message: 'Invalid image',
          item: null,
        };
      }
      this.logger.error(error);
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        item: null,
      };
    } finally {
      await queryRunner?.release();
    }
  }

  async deleteMenuItem(menuItemId: number): Promise<IMenuItemResponse> {
    let queryRunner: QueryRunner | undefined;
    try {
      const menuItem = await this.menuItemRepository.findOneBy({
        id: menuItemId,
      });
      if (!menuItem) {
        return {
          status: HttpStatus.NOT_FOUND,
          message: 'Menu item not found',
          item: null,
        };
      }
      const deletedItem = toMenuItemView(menuItem);

      queryRunner = this.dataSource.createQueryRunner();
      await queryRunner.connect();
      await queryRunner.startTransaction();
      await queryRunner.manager.delete(CartItem, { menuItemId });
      await queryRunner.manager.remove(MenuItem, menuItem);
      await queryRunner.commitTransaction();

      if (menuItem.imageFile) {
        await this.removeImageFile(menuItem.imageFile);
      }
      this.cacheService.delByPrefix(POPULAR_ITEMS_CACHE_PREFIX);
      this.logger.log(menuItemId, `dish deleted: ${menuItem.name}`);
      return {
        status: HttpStatus.OK,
        message: `Deleted ${menuItem.name}`,
        item: deletedItem,
      };
    } catch (error) {
      this.logger.error(error);
      if (queryRunner?.isTransactionActive) {
        await queryRunner.rollbackTransaction();
      }
      return {
        status: HttpStatus.INTERNAL_SERVER_ERROR,
        message: errorMessage(error),
        item: null,
      };
    } finally {
      await queryRunner?.release();
    }
  }

  private async removeImageFile(imageFile: string) {
    try {
      await fs.unlink(path.join(this.imagesDir, imageFile));
    } catch (error) {
      if (!isFileNotFoundError(error)) {
        this.logger.warn(
          `could not remove image ${imageFile}: ${errorMessage(error)}`,
        );
      }
    }
  }
}
