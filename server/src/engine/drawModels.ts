/**
 * drawModels.ts
 *
 * How a single shop refresh is modelled. Both models share one signature so a
 * calculator is built with exactly one of them and never mixes the two.
 *
 * - `independent` (default): every slot is an independent draw with the
 *   per-slot probability q * r / T. Slots within a refresh actually draw
 *   without replacement, so this slightly underestimates the hit chance for
 *   scarce tiers.
 * - `hypergeometric`: slots draw without replacement within the refresh. A
 *   slot that rolls the tier takes one unit out of that tier's remaining pool
 *   for the rest of the refresh.
 */

export type DrawModelName = "independent" | "hypergeometric";

export interface DrawModel {
    readonly name: DrawModelName;

    /**
     * Probability that one refresh shows at least one copy of the unit.
     *
     * @param tierProbability chance a slot rolls the unit's cost tier
     * @param unitRemaining copies of the unit left in the pool
     * @param tierRemaining copies left across the whole tier
     * @param slots slots per refresh
     */
    refreshHitProbability(tierProbability: number, unitRemaining: number, tierRemaining: number, slots: number): number;
}

export const independentDrawModel: DrawModel = {
    name: "independent",
    refreshHitProbability(q, r, t, slots) {
        if (r <= 0 || t <= 0) return 0;
        const perSlot = q * (r / t);
        return 1 - Math.pow(1 - perSlot, slots);
    },
};

export const hypergeometricDrawModel: DrawModel = {
    name: "hypergeometric",
    refreshHitProbability(q, r, t, slots) {
        if (r <= 0 || t <= 0) return 0;
        // miss[j]: probability of no hit so far with j other tier units already drawn
        let miss = [1];
        for (let slot = 0; slot < slots; slot++) {
            const next = new Array<number>(miss.length + 1).fill(0);
            for (let j = 0; j < miss.length; j++) {
                const mass = miss[j];
                if (mass === 0) continue;
                next[j] += mass * (1 - q);
                const others = t - r - j;
                if (others > 0) next[j + 1] += mass * q * (others / (t - j));
            }
            miss = next;
        }
        return 1 - miss.reduce((sum, m) => sum + m, 0);
    },
};

export function drawModelByName(name: DrawModelName): DrawModel {
    return name === "hypergeometric" ? hypergeometricDrawModel : independentDrawModel;
}
