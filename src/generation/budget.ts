export const DEFAULT_MAX_TOKENS = 1000;

/** Room kept below the budget so a round never starts right at the ceiling */
export const BUDGET_SAFETY_MARGIN = 2;

export interface BudgetOptions {
	maxNewTokens?: number;
	minNewTokens?: number;
	/** Absolute bound including the prompt; converted by subtracting the prompt length */
	maxLength?: number;
	minLength?: number;
}

export interface TokenBudget {
	maxTokens: number;
	minTokens?: number;
}

/** Explicit new-token counts win over absolute lengths */
export function resolveTokenBudget(
	options: BudgetOptions,
	seedLength: number,
	defaultMaxTokens = DEFAULT_MAX_TOKENS,
): TokenBudget {
	let maxTokens = options.maxLength === undefined ? undefined : options.maxLength - seedLength;
	let minTokens = options.minLength === undefined ? undefined : options.minLength - seedLength;

	if (options.maxNewTokens !== undefined) maxTokens = options.maxNewTokens;
	if (options.minNewTokens !== undefined) minTokens = options.minNewTokens;

	const budget: TokenBudget = { maxTokens: maxTokens ?? defaultMaxTokens };
	if (minTokens !== undefined) budget.minTokens = minTokens;
	return budget;
}
