export {
	assertTimeout,
	createDeadlineScheduler,
	type DeadlineHandle,
	type DeadlineScheduler,
} from "./deadline";
