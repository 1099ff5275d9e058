export {
	createEventEmitter,
	type EventMap,
	type TypedEventEmitter,
} from "./event-emitter";
