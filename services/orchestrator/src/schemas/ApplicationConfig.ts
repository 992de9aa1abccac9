import { ConfigNode, type ReadonlyConfigNode } from "../tree/ConfigNode.js";
import {
  EnumValue,
  FloatValue,
  IntegerValue,
  ObjectValue,
  StringValue,
  type ReadonlyObjectValue,
  type ReadonlyValue,
} from "../values/index.js";

export const APPLICATION_TYPES = ["live", "vod"] as const;
export type ApplicationType = (typeof APPLICATION_TYPES)[number];

export interface ReadonlyLlhlsConfig extends ReadonlyConfigNode {
  readonly chunkDuration: ReadonlyValue<number>;
  readonly segmentDuration: ReadonlyValue<number>;
  readonly segmentCount: ReadonlyValue<number>;
}

/** Low-latency HLS publisher settings. Durations are in seconds. */
export class LlhlsConfig extends ConfigNode implements ReadonlyLlhlsConfig {
  readonly tag = "LLHLS";
  readonly chunkDuration = this.define("ChunkDuration", new FloatValue());
  readonly segmentDuration = this.define("SegmentDuration", new FloatValue());
  readonly segmentCount = this.define("SegmentCount", new IntegerValue());

  protected spawn(): LlhlsConfig {
    return new LlhlsConfig();
  }
}

export interface ReadonlyPublishersConfig extends ReadonlyConfigNode {
  readonly llhls: ReadonlyObjectValue<ReadonlyLlhlsConfig>;
}

export class PublishersConfig extends ConfigNode implements ReadonlyPublishersConfig {
  readonly tag = "Publishers";
  readonly llhls = this.define("LLHLS", new ObjectValue(() => new LlhlsConfig()));

  protected spawn(): PublishersConfig {
    return new PublishersConfig();
  }
}

export interface ReadonlyApplicationConfig extends ReadonlyConfigNode {
  readonly name: ReadonlyValue<string>;
  readonly type: ReadonlyValue<ApplicationType>;
  readonly publishers: ReadonlyObjectValue<ReadonlyPublishersConfig>;
}

export class ApplicationConfig extends ConfigNode implements ReadonlyApplicationConfig {
  readonly tag = "Application";
  readonly name = this.define("Name", new StringValue());
  readonly type = this.define("Type", new EnumValue<ApplicationType>(APPLICATION_TYPES));
  readonly publishers = this.define("Publishers", new ObjectValue(() => new PublishersConfig()));

  protected spawn(): ApplicationConfig {
    return new ApplicationConfig();
  }
}
