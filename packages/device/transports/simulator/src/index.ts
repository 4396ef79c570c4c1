export { SimulatedVmcTransport } from "./simulated-transport.js";
export type {
	InjectFaultOptions,
	SimulatedDelivery,
	SimulatedFault,
	SimulatedPayment,
	SimulatorOptions,
} from "./types.js";
