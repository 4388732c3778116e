import type { LanguageModel, ClassificationRequest } from "@helpdesk/types";
import { defaultGatewayConfig, silentLogger, type GatewayConfig } from "@helpdesk/core";
import { MockLanguageModel } from "@helpdesk/runtime";
import { SupportGateway, type GatewayOptions } from "@helpdesk/support";

/** Defaults plus the retention the shipped config uses. */
export function testConfig(): GatewayConfig {
  const config = defaultGatewayConfig();
  config.scratch.retain = ["lastTicketId", "lastOrderId"];
  return config;
}

export function startGateway(config: GatewayConfig = testConfig(), opts: GatewayOptions = {}): Promise<SupportGateway> {
  return SupportGateway.start(config, { log: silentLogger(), ...opts });
}

/** The scripted model, with every classification request kept for inspection. */
export function recordingModel(overrides: Partial<LanguageModel> = {}) {
  const inner = new MockLanguageModel();
  const classifications: ClassificationRequest[] = [];
  const model: LanguageModel = {
    complete: overrides.complete ?? ((request, signal) => inner.complete(request, signal)),
    classify: (request, signal) => {
      classifications.push(request);
      return overrides.classify ? overrides.classify(request, signal) : inner.classify(request, signal);
    },
  };
  return { model, classifications };
}
