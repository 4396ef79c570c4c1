/**
 * VMC serial protocol constants
 *
 * Frame layout: [ADDR][SEQ][HEADER][CMD][LEN][DATA...][CHK]
 */

/** Fixed address byte that opens every frame */
export const FRAME_ADDRESS = 0xff;

/** Fixed sequence byte; the protocol carries no transaction ids */
export const FRAME_SEQUENCE = 0x00;

/** ADDR + SEQ + HEADER + CMD + LEN + CHK */
export const MIN_FRAME_LENGTH = 6;

export const MAX_PAYLOAD_LENGTH = 0xff;

/** Direction marker in the HEADER byte */
export const FrameHeader = {
	/** host → board */
	HOST: 0x55,
	/** board → host */
	DEVICE: 0xaa,
} as const;

export type FrameHeader = (typeof FrameHeader)[keyof typeof FrameHeader];

/**
 * Command codes.
 *
 * QUERY_STATUS and QUERY_BALANCE share 0xE1 on the wire; the request payload
 * differs and the caller says which reply shape it expects.
 */
export const VMC_COMMANDS = {
	GET_DEVICE_ID: 0x31,
	DELIVER: 0x41,
	REMOVE_FAULT: 0xa2,
	QUERY_STATUS: 0xe1,
	QUERY_BALANCE: 0xe1,
	PAYMENT_INSTRUCTION: 0x11,
	COIN_CHANGE: 0xb1,
	CASHLESS_CANCEL: 0xb2,
	DEBIT_INSTRUCTION: 0xb3,
	AGE_RECOGNITION: 0x12,
	QUERY_COIN_CHANGE_STATUS: 0x07,
	QUERY_AGE_VERIFICATION: 0x06,
} as const;

export type VmcCommandName = keyof typeof VMC_COMMANDS;

export type VmcCommandCode = (typeof VMC_COMMANDS)[VmcCommandName];

/** Status byte the board uses for "ok" in single-byte replies */
export const STATUS_SUCCESS = 0x01;

export const PAYMENT_METHODS = {
	CANCEL: 0x00,
	COIN: 0x01,
	CASHLESS: 0x02,
	BILL_ACCEPTOR: 0x03,
} as const;

export type PaymentMethod =
	(typeof PAYMENT_METHODS)[keyof typeof PAYMENT_METHODS];

/** Marker byte the board expects in a GET_DEVICE_ID request */
export const DEVICE_ID_MARKER = 0xad;

/** Payload byte addressing every unit ("all") */
export const BROADCAST = 0xff;

/** Fixed payload byte of the two status-query commands without arguments */
export const QUERY_MARKER = 0x01;

/** Length of the ASCII device id in a GET_DEVICE_ID reply */
export const DEVICE_ID_LENGTH = 15;

const COMMAND_LABELS: Record<number, string> = {
	[VMC_COMMANDS.GET_DEVICE_ID]: "get-device-id",
	[VMC_COMMANDS.DELIVER]: "deliver",
	[VMC_COMMANDS.REMOVE_FAULT]: "remove-fault",
	[VMC_COMMANDS.QUERY_STATUS]: "query-status/balance",
	[VMC_COMMANDS.PAYMENT_INSTRUCTION]: "payment-instruction",
	[VMC_COMMANDS.COIN_CHANGE]: "coin-change",
	[VMC_COMMANDS.CASHLESS_CANCEL]: "cashless-cancel",
	[VMC_COMMANDS.DEBIT_INSTRUCTION]: "debit-instruction",
	[VMC_COMMANDS.AGE_RECOGNITION]: "age-recognition",
	[VMC_COMMANDS.QUERY_COIN_CHANGE_STATUS]: "query-coin-change-status",
	[VMC_COMMANDS.QUERY_AGE_VERIFICATION]: "query-age-verification",
};

/**
 * Label for a command code, for logs; undefined for codes outside the catalog.
 */
export function commandLabel(command: number): string | undefined {
	return COMMAND_LABELS[command];
}
