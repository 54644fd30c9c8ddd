import {Entity, PrimaryGeneratedColumn, Column, Index, CreateDateColumn, UpdateDateColumn,} from "typeorm";

@Entity()
export class Opportunity {
    @PrimaryGeneratedColumn({ type: "bigint"})
    id!: number;

    @Index()
    @Column({ type: "varchar", length: 200, nullable: false })
    team_name!: string;

    @Index()
    @Column({type:"int", nullable: false })
    sport_id!: number;

    @Index()
    @Column({ type: "varchar", length: 100, nullable: false })
    sport_name!: string;

    // mysql returns decimals as strings
    @Column({ type: "decimal", precision: 20, scale: 2, nullable: true })
    odds!: string | null;

    @Column({ type: "varchar", length: 20, nullable: true })
    american_odds!: string | null;

    @Column({ type: "decimal", precision: 5, scale: 4, nullable: true })
    probability!: string | null;

    @Index()
    @Column({ type: "datetime", nullable: true })
    event_date!: Date | null;

    @Index()
    @Column({type:"int", nullable: false, default: 0 })
    status!: number;

    @Index()
    @CreateDateColumn()
    created!: string;

    @Index()
    @UpdateDateColumn()
    updated!: string;

}
