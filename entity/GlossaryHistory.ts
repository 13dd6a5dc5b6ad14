import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { GlossaryEntry } from "./GlossaryEntry";

/** Snapshot of an entry taken on every create and update. Rows are never edited. */
@Entity("glossary_history")
@Index("idx_glossary_history_glossary_id_created_at", ["glossaryId", "createdAt"])
export class GlossaryHistory {
  @PrimaryColumn("uuid")
  id!: string;

  @Column({ name: "glossary_id", type: "uuid" })
  glossaryId!: string;

  @ManyToOne(() => GlossaryEntry, { onDelete: "CASCADE", nullable: false })
  @JoinColumn({ name: "glossary_id" })
  glossary?: GlossaryEntry;

  @Column({ length: 255 })
  term!: string;

  @Column("text")
  definition!: string;

  @Column({ default: 0 })
  revision!: number;

  @Column({ type: "varchar", length: 255, nullable: true })
  who!: string | null;

  @Column({ name: "created_at" })
  createdAt!: Date;
}
