import { Column, Entity, ManyToMany, PrimaryGeneratedColumn } from 'typeorm';
import { BookEntity } from './BookEntity';

@Entity('author')
export class AuthorEntity {
  @PrimaryGeneratedColumn('uuid')
  id!: string;

  @Column({ type: 'varchar', length: 255 })
  name!: string;

  @Column({ type: 'text', nullable: true })
  biography!: string | null;

  @Column({ name: 'birth_date', type: 'date', nullable: true })
  birthDate!: string | null;

  @ManyToMany(() => BookEntity, (book) => book.authors)
  books?: BookEntity[];
}
