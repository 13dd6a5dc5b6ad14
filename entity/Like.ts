import { Entity, PrimaryColumn, Column, Index, ManyToOne, JoinColumn } from "typeorm";
import { GlossaryEntry } from "./GlossaryEntry";

@Entity("likes")
@Index("idx_likes_glossary_id_created_at", ["glossaryId", "createdAt"])
export class Like {
  @PrimaryColumn("uuid")
  id!: string;

  @Column({ name: "glossary_id", type: "uuid" })
  glossaryId!: string;

  @ManyToOne(() => GlossaryEntry, { onDelete: "CASCADE", nullable: false })
  @JoinColumn({ name: "glossary_id" })
  glossary?: GlossaryEntry;

  @Column({ type: "varchar", length: 255, nullable: true })
  who!: string | null;

  @Column({ name: "created_at" })
  createdAt!: Date;
}
