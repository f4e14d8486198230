export { ChannelIdGenerator, type ChannelIdGeneratorOptions, createChannelIdGenerator, type RandomIndex } from "./id-generator";
export { ChannelRegistry, createChannelRegistry } from "./registry";
export type {
    ActionResult,
    Channel,
    ChannelRegistryConfig,
    ChannelRegistryDependencies,
    GenerateResult,
    JoinResult,
    LeaveResult,
    RegistryStats,
} from "./types";
