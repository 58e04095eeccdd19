export {
	ConfigError,
	type JobConfig,
	LogLevelSchema,
	loadJobConfig,
	type RawJobEnv,
	StoredDatePolicyName,
} from "./env.js";
