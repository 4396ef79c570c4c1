/** Fault a simulated slot reports once a delivery completes */
export type SimulatedFault = "motor" | "optical" | number;

export interface InjectFaultOptions {
	/** Survive REMOVE_FAULT. @default false */
	persistent?: boolean;
}

export interface SimulatorOptions {
	/** @default "Simulated VMC" */
	name?: string;
	/** Padded or cut to 15 characters. @default "VMC-SIM-0000001" */
	deviceId?: string;
	/** Status queries left unanswered after each delivery. @default 0 */
	busyPolls?: number;
	/** Latency of every reply. @default 0 */
	responseDelayMs?: number;
	/** Credit reported by QUERY_BALANCE, in cents. @default 0 */
	balanceCents?: number;
	/** Answer to QUERY_COIN_CHANGE_STATUS. @default true */
	canRefund?: boolean;
	/** Answer to QUERY_AGE_VERIFICATION. @default false */
	ageVerified?: boolean;
}

export interface SimulatedDelivery {
	slot: number;
	quantity: number;
}

export interface SimulatedPayment {
	amountCents: number;
	method: number;
	slot: number;
}
