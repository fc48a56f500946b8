import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  OneToMany,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { CustomerType } from '../enums';
import { OrderItem } from './order-item.entity';

@Entity()
export class Order {
  //? Sequential order number shown to customers
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', nullable: true })
  @Index()
  userId!: string | null;

  @Column()
  customerName!: string;

  @Column({ type: 'varchar', enum: CustomerType })
  customerType!: CustomerType;

  @Column('double precision')
  totalAmount!: number;

  @CreateDateColumn()
  @Index()
  createdAt!: Date;

  //? Relations
  @OneToMany(() => OrderItem, (orderItem) => orderItem.order, {
    cascade: ['insert', 'update'],
  })
  orderItems!: OrderItem[];
}
