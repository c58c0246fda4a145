import { z } from 'zod';
import { SchemaViolationError } from '../errors.js';

export const UsageFiguresSchema = z.object({
	includedUsed: z.number().int().nonnegative().default(0),
	includedTotal: z.number().int().nonnegative().default(0),
	onDemandUsed: z.number().nonnegative().default(0),
	onDemandLimit: z.number().nonnegative().default(0),
	lastModelName: z.string().min(1).optional(),
	lastRequestTimestamp: z.string().min(1).optional(),
	isThinkingMode: z.boolean().default(false),
	isMaxMode: z.boolean().default(false),
});

export type UsageFiguresInput = z.input<typeof UsageFiguresSchema>;
export type UsageFigures = z.infer<typeof UsageFiguresSchema>;

/**
 * One successfully parsed reading of the dashboard. Built once per extraction
 * and frozen; a newer reading replaces it wholesale.
 */
export class UsageSnapshot implements UsageFigures {
	readonly includedUsed: number;
	readonly includedTotal: number;
	readonly onDemandUsed: number;
	readonly onDemandLimit: number;
	readonly lastModelName?: string;
	readonly lastRequestTimestamp?: string;
	readonly isThinkingMode: boolean;
	readonly isMaxMode: boolean;

	private constructor(figures: UsageFigures) {
		this.includedUsed = figures.includedUsed;
		this.includedTotal = figures.includedTotal;
		this.onDemandUsed = figures.onDemandUsed;
		this.onDemandLimit = figures.onDemandLimit;
		this.lastModelName = figures.lastModelName;
		this.lastRequestTimestamp = figures.lastRequestTimestamp;
		this.isThinkingMode = figures.isThinkingMode;
		this.isMaxMode = figures.isMaxMode;
		Object.freeze(this);
	}

	/**
	 * Validates and freezes a set of figures. Omitted figures take their
	 * empty defaults (zero, absent, false).
	 */
	static create(input: UsageFiguresInput = {}): UsageSnapshot {
		const parsed = UsageFiguresSchema.safeParse(input);
		if (!parsed.success) {
			throw new SchemaViolationError(
				'usage',
				parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
			);
		}
		return new UsageSnapshot(parsed.data);
	}

	/** Share of included requests used, 0–100+. Zero when the total is zero. */
	get includedPercentage(): number {
		if (this.includedTotal === 0) return 0;
		return (this.includedUsed / this.includedTotal) * 100;
	}

	/** May go negative: the dashboard reports overruns as-is. */
	get includedRemaining(): number {
		return this.includedTotal - this.includedUsed;
	}

	get displayModel(): string {
		return this.lastModelName ?? 'Unknown';
	}

	toJSON(): UsageFigures {
		return {
			includedUsed: this.includedUsed,
			includedTotal: this.includedTotal,
			onDemandUsed: this.onDemandUsed,
			onDemandLimit: this.onDemandLimit,
			lastModelName: this.lastModelName,
			lastRequestTimestamp: this.lastRequestTimestamp,
			isThinkingMode: this.isThinkingMode,
			isMaxMode: this.isMaxMode,
		};
	}
}
