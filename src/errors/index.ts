export {
	AbortError,
	BluetoothPoweredOffError,
	type BluetoothStateError,
	BluetoothUnauthorizedError,
	BluetoothUnsupportedError,
	CentralDisposedError,
	type CentralError,
	CentralOperationError,
	ConnectFailedUnknownReasonError,
	gateErrorFor,
	isCentralError,
	normalizeError,
	raceWithAbort,
	ScanTerminatedError,
	TimeoutError,
	throwIfAborted,
} from "./errors";
