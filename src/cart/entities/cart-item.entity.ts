import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
  Unique,
} from 'typeorm';
import { MenuItem } from '../../menu/entities';

@Entity()
@Unique(['userId', 'menuItemId'])
export class CartItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  @Index()
  userId!: string;

  @Column()
  menuItemId!: number;

  //? Relations
  @ManyToOne(() => MenuItem, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'menuItemId' })
  menuItem!: MenuItem;

  @Column('integer')
  quantity!: number;

  @CreateDateColumn()
  createdAt!: Date;
}
