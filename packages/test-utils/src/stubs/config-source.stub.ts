/**
 * Session config stub backed by a plain map
 */

import { type ConfigSource, DEFAULT_CONFIG } from "@colframe/shared";
import { type Mock, vi } from "vitest";

import { withOverrides } from "./with-overrides";

/** Config source stub interface for test assertions */
export interface ConfigSourceStub extends ConfigSource {
  getConfigs: Mock<(...keys: string[]) => Array<string | null>>;
  set: (key: string, value: string | null) => void;
}

/**
 * Create a config source stub seeded with the session defaults
 * @param entries - Values layered over the defaults
 */
export function createConfigSourceStub(
  entries: Readonly<Record<string, string>> = {},
  overrides?: Partial<ConfigSourceStub>,
): ConfigSourceStub {
  const values = new Map<string, string | null>(
    Object.entries({ ...DEFAULT_CONFIG, ...entries }),
  );

  return withOverrides<ConfigSourceStub>(
    {
      getConfigs: vi.fn((...keys: string[]) =>
        keys.map((key) => values.get(key) ?? null),
      ),
      set: (key, value) => {
        values.set(key, value);
      },
    },
    overrides,
  );
}
