import { Column, Entity, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Order } from './order.entity';

@Entity()
export class OrderItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => Order, (order) => order.orderItems, { onDelete: 'CASCADE' })
  order!: Order;

  //? No foreign key: order history outlives deleted dishes
  @Column({ type: 'integer', nullable: true })
  menuItemId!: number | null;

  @Column()
  name!: string;

  @Column('double precision')
  price!: number;

  @Column('integer')
  quantity!: number;

  @Column('double precision')
  subTotal!: number;
}
