import { ConfigNode, type ReadonlyConfigNode } from "../tree/ConfigNode.js";
import {
  EnumValue,
  IntegerValue,
  ListValue,
  ObjectValue,
  StringValue,
  type ReadonlyListValue,
  type ReadonlyObjectValue,
  type ReadonlyValue,
} from "../values/index.js";
import { HostConfig, type ReadonlyHostConfig } from "./HostConfig.js";
import { VirtualHostConfig, type ReadonlyVirtualHostConfig } from "./VirtualHostConfig.js";

export const SERVER_TYPES = ["origin", "edge"] as const;
export type ServerType = (typeof SERVER_TYPES)[number];

export interface ReadonlyApiBindConfig extends ReadonlyConfigNode {
  readonly port: ReadonlyValue<number>;
}

export class ApiBindConfig extends ConfigNode implements ReadonlyApiBindConfig {
  readonly tag = "API";
  readonly port = this.define("Port", new IntegerValue());

  protected spawn(): ApiBindConfig {
    return new ApiBindConfig();
  }
}

export interface ReadonlyManagersBindConfig extends ReadonlyConfigNode {
  readonly api: ReadonlyObjectValue<ReadonlyApiBindConfig>;
}

export class ManagersBindConfig extends ConfigNode implements ReadonlyManagersBindConfig {
  readonly tag = "Managers";
  readonly api = this.define("API", new ObjectValue(() => new ApiBindConfig()));

  protected spawn(): ManagersBindConfig {
    return new ManagersBindConfig();
  }
}

export interface ReadonlyBindConfig extends ReadonlyConfigNode {
  readonly managers: ReadonlyObjectValue<ReadonlyManagersBindConfig>;
}

export class BindConfig extends ConfigNode implements ReadonlyBindConfig {
  readonly tag = "Bind";
  readonly managers = this.define("Managers", new ObjectValue(() => new ManagersBindConfig()));

  protected spawn(): BindConfig {
    return new BindConfig();
  }
}

export interface ReadonlyApiConfig extends ReadonlyConfigNode {
  readonly accessToken: ReadonlyValue<string>;
  readonly crossDomains: ReadonlyListValue<ReadonlyValue<string>>;
}

/** Admin API settings: the access token and the allowed CORS origins. */
export class ApiConfig extends ConfigNode implements ReadonlyApiConfig {
  readonly tag = "API";
  readonly accessToken = this.define("AccessToken", new StringValue());
  readonly crossDomains = this.define("CrossDomains", new ListValue("Url", () => new StringValue()));

  protected spawn(): ApiConfig {
    return new ApiConfig();
  }
}

export interface ReadonlyManagersConfig extends ReadonlyConfigNode {
  readonly host: ReadonlyObjectValue<ReadonlyHostConfig>;
  readonly api: ReadonlyObjectValue<ReadonlyApiConfig>;
}

export class ManagersConfig extends ConfigNode implements ReadonlyManagersConfig {
  readonly tag = "Managers";
  readonly host = this.define("Host", new ObjectValue(() => new HostConfig()));
  readonly api = this.define("API", new ObjectValue(() => new ApiConfig()));

  protected spawn(): ManagersConfig {
    return new ManagersConfig();
  }
}

export interface ReadonlyServerConfig extends ReadonlyConfigNode {
  readonly version: ReadonlyValue<number>;
  readonly name: ReadonlyValue<string>;
  readonly type: ReadonlyValue<ServerType>;
  readonly ips: ReadonlyListValue<ReadonlyValue<string>>;
  readonly bind: ReadonlyObjectValue<ReadonlyBindConfig>;
  readonly managers: ReadonlyObjectValue<ReadonlyManagersConfig>;
  readonly virtualHosts: ReadonlyListValue<ReadonlyObjectValue<ReadonlyVirtualHostConfig>>;
}

/** Root of the media server document (`<Server version="8">`). */
export class ServerConfig extends ConfigNode implements ReadonlyServerConfig {
  readonly tag = "Server";
  readonly version = this.define("version", new IntegerValue());
  readonly name = this.define("Name", new StringValue());
  readonly type = this.define("Type", new EnumValue<ServerType>(SERVER_TYPES));
  readonly ips = this.define("IP", new ListValue("IP", () => new StringValue(), { inline: true }));
  readonly bind = this.define("Bind", new ObjectValue(() => new BindConfig()));
  readonly managers = this.define("Managers", new ObjectValue(() => new ManagersConfig()));
  readonly virtualHosts = this.define(
    "VirtualHosts",
    new ListValue("VirtualHost", () => new ObjectValue(() => new VirtualHostConfig())),
  );

  protected spawn(): ServerConfig {
    return new ServerConfig();
  }
}
