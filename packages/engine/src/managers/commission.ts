import { applyRate, assertMinorUnits } from "@instalo/core";

export interface CommissionSplit {
	commissionAmount: number;
	netAmount: number;
}

/** Commission rounds half-up; the merchant receives the rest, so the two always sum to gross. */
export function computeNet(grossAmount: number, ratePpm: number): CommissionSplit {
	assertMinorUnits(grossAmount, "grossAmount");
	const commissionAmount = applyRate(grossAmount, ratePpm);
	return { commissionAmount, netAmount: grossAmount - commissionAmount };
}
