import { Entity, PrimaryColumn, Column, Index } from "typeorm";

@Entity("glossary")
@Index("idx_glossary_updated_at", ["updatedAt"])
export class GlossaryEntry {
  @PrimaryColumn("uuid")
  id!: string;

  @Column({ length: 255, unique: true })
  term!: string;

  @Column("text")
  definition!: string;

  // Bumped by exactly one on every update, never reset.
  @Column({ default: 0 })
  revision!: number;

  @Column({ name: "created_at" })
  createdAt!: Date;

  @Column({ name: "updated_at" })
  updatedAt!: Date;
}
