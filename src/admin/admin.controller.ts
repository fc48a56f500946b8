import {
  Body,
  Controller,
  Delete,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Query,
  StreamableFile,
  UploadedFile,
  UseGuards,
  UseInterceptors,
} from '@nestjs/common';
import { FileInterceptor } from '@nestjs/platform-express';
import { Roles } from '../auth/decorators';
import { Role } from '../auth/enums';
import { JwtAuthGuard, RolesGuard } from '../auth/guards';
import { CreateMenuItemDto } from '../menu/dto';
import { IMenuItemResponse } from '../menu/interfaces';
import { MenuService } from '../menu/menu.service';
import { ListOrdersDto } from '../order/dto';
import { IOrdersResponse } from '../order/interfaces';
import { OrderService } from '../order/order.service';
import { IResponse } from '../shared/interfaces';
import { AdminService } from './admin.service';
import {
  IAnalyticsResponse,
  IDashboardResponse,
  IExportResponse,
} from './interfaces';

const MAX_IMAGE_UPLOAD_BYTES = 5 * 1024 * 1024;

const toDownload = ({
  status,
  message,
  file,
}: IExportResponse): StreamableFile | IResponse =>
  file
    ? new StreamableFile(file.content, {
        type: file.contentType,
        disposition: `attachment; filename="${file.fileName}"`,
      })
    : { status, message };

@Controller('admin')
@UseGuards(JwtAuthGuard, RolesGuard)
@Roles(Role.ADMIN)
export class AdminController {
  constructor(
    private readonly adminService: AdminService,
    private readonly menuService: MenuService,
    private readonly orderService: OrderService,
  ) {}

  @Get('dashboard')
  async getDashboard(): Promise<IDashboardResponse> {
    return this.adminService.getDashboard();
  }

  @Post('menu')
  @UseInterceptors(
    FileInterceptor('image', { limits: { fileSize: MAX_IMAGE_UPLOAD_BYTES } }),
  )
  async addMenuItem(
    @Body() createMenuItemDto: CreateMenuItemDto,
    @UploadedFile() image?: Express.Multer.File,
  ): Promise<IMenuItemResponse> {
    return this.menuService.addMenuItem(createMenuItemDto, image);
  }

  @Delete('menu/:id')
  async deleteMenuItem(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<IMenuItemResponse> {
    return this.menuService.deleteMenuItem(id);
  }

  @Get('orders')
  async getRecentOrders(
    @Query() listOrdersDto: ListOrdersDto,
  ): Promise<IOrdersResponse> {
    return this.orderService.getRecentOrders(listOrdersDto.limit);
  }

  @Delete('orders/:id')
  async deleteOrder(@Param('id', ParseIntPipe) id: number): Promise<IResponse> {
    return this.orderService.deleteOrder(id);
  }

  @Get('analytics')
  async getAnalytics(): Promise<IAnalyticsResponse> {
    return this.adminService.getAnalytics();
  }

  @Get('orders/export/csv')
  async exportOrdersCsv(): Promise<StreamableFile | IResponse> {
    return toDownload(await this.adminService.exportOrdersCsv());
  }

  @Get('orders/export/pdf')
  async exportOrdersPdf(): Promise<StreamableFile | IResponse> {
    return toDownload(await this.adminService.exportOrdersPdf());
  }
}
