import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
} from 'typeorm';

@Entity()
export class MenuItem {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column()
  name!: string;

  @Column('double precision')
  price!: number;

  @Column('double precision', { default: 4 })
  rating!: number;

  @Column({ default: 'Main Course' })
  @Index()
  category!: string;

  @Column('simple-array')
  tags!: string[];

  //? File name inside IMAGES_DIR
  @Column({ type: 'varchar', nullable: true })
  imageFile!: string | null;

  @CreateDateColumn()
  createdAt!: Date;
}
