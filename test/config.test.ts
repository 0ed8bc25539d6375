/**
 * Tests for configuration loading and precedence
 */

import { describe, it, before, after } from "node:test";
import assert from "node:assert";
import {
  expandEnvVars,
  findConfigFile,
  getDefaultConfig,
  loadConfig,
  mergeConfigs,
  resolveConfig,
  validateConfig,
} from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { TestWorkspace, createTestWorkspace } from "./test-workspace.js";

describe("expandEnvVars", () => {
  const env = { SQL_USER: "deploy", EMPTY: "" };

  it("should expand $VAR and ${VAR}", () => {
    assert.strictEqual(expandEnvVars("$SQL_USER/${SQL_USER}", env), "deploy/deploy");
  });

  it("should fall back to the default in ${VAR:default}", () => {
    assert.strictEqual(expandEnvVars("${MISSING:guest}", env), "guest");
    assert.strictEqual(expandEnvVars("${EMPTY:guest}", env), "guest");
  });

  it("should keep the default intact when it contains a colon", () => {
    assert.strictEqual(expandEnvVars("${MISSING:C:\\sql}", env), "C:\\sql");
  });

  it("should leave unknown variables untouched", () => {
    assert.strictEqual(expandEnvVars("$MISSING", env), "$MISSING");
  });
});

describe("config files", () => {
  let workspace: TestWorkspace;

  before(async () => {
    workspace = createTestWorkspace();
    await workspace.initialize();
  });

  after(async () => {
    await workspace?.destroy();
  });

  it("should find .fanoutrc in a directory", async () => {
    const rcPath = await workspace.writeFile("rc/.fanoutrc", "{}");
    assert.strictEqual(findConfigFile(workspace.resolve("rc")), rcPath);
    assert.strictEqual(findConfigFile(workspace.resolve("missing")), null);
  });

  it("should load options and expand environment variables", async () => {
    const configPath = await workspace.writeFile(
      "load.json",
      JSON.stringify({
        csv: "servers.csv",
        username: "${SQL_USER}",
        include_date: true,
      })
    );

    assert.deepStrictEqual(loadConfig(configPath, { SQL_USER: "deploy" }), {
      csv: "servers.csv",
      username: "deploy",
      include_date: true,
    });
  });

  it("should reject options of the wrong type", async () => {
    const configPath = await workspace.writeFile(
      "bad-type.json",
      JSON.stringify({ header: "yes" })
    );

    assert.throws(
      () => loadConfig(configPath, {}),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === 'Config option "header" must be a boolean'
    );
  });

  it("should wrap JSON syntax errors in ConfigError", async () => {
    const configPath = await workspace.writeFile("broken.json", "{ csv: ");
    assert.throws(() => loadConfig(configPath, {}), ConfigError);
  });

  it("should apply CLI over environment over file", async () => {
    const configPath = await workspace.writeFile(
      "precedence.json",
      JSON.stringify({
        csv: "from-file.csv",
        script: "from-file.sql",
        out: "file-out",
      })
    );

    const resolved = resolveConfig({ script: "from-cli.sql" }, configPath, {
      FANOUT_CSV: "from-env.csv",
      FANOUT_SCRIPT: "from-env.sql",
      SQLCMD_USERNAME: "env-user",
    });

    assert.strictEqual(resolved.csv, "from-env.csv");
    assert.strictEqual(resolved.script, "from-cli.sql");
    assert.strictEqual(resolved.out, "file-out");
    assert.strictEqual(resolved.username, "env-user");
    assert.strictEqual(resolved.password, "password");
  });

  it("should let environment credentials replace file credentials", async () => {
    const configPath = await workspace.writeFile(
      "file-credentials.json",
      JSON.stringify({ csv: "file.csv", username: "file-user", password: "file-pass" })
    );

    const resolved = resolveConfig({}, configPath, {
      FANOUT_CSV: "env.csv",
      SQLCMD_USERNAME: "env-user",
    });

    assert.strictEqual(resolved.csv, "env.csv");
    assert.strictEqual(resolved.username, "env-user");
    assert.strictEqual(resolved.password, "file-pass");
  });

  it("should take environment values the file leaves unset", async () => {
    const configPath = await workspace.writeFile("empty.json", "{}");

    const resolved = resolveConfig({}, configPath, {
      FANOUT_CSV: "env.csv",
      OUTPUT_DIR: "env-out",
      SQLCMD_PASSWORD: "",
    });

    assert.strictEqual(resolved.csv, "env.csv");
    assert.strictEqual(resolved.out, "env-out");
    assert.strictEqual(resolved.password, "");
  });
});

describe("mergeConfigs", () => {
  it("should keep explicit empty credentials and false flags", () => {
    const merged = mergeConfigs(getDefaultConfig(), {
      username: "",
      header: false,
    });

    assert.strictEqual(merged.username, "");
    assert.strictEqual(merged.password, "password");
    assert.strictEqual(merged.header, false);
    assert.strictEqual(merged.extension, ".sql");
  });
});

describe("validateConfig", () => {
  it("should require a CSV file", () => {
    assert.throws(
      () => validateConfig({ ...getDefaultConfig(), script: "setup.sql" }),
      (error: unknown) =>
        error instanceof ConfigError &&
        error.message === "A CSV file must be specified (--csv)"
    );
  });

  it("should require a script", () => {
    assert.throws(
      () => validateConfig({ ...getDefaultConfig(), csv: "servers.csv" }),
      ConfigError
    );
  });

  it("should require a dotted extension", () => {
    assert.throws(
      () =>
        validateConfig({
          ...getDefaultConfig(),
          csv: "servers.csv",
          script: "setup.sql",
          extension: "sql",
        }),
      ConfigError
    );
  });

  it("should accept a complete configuration", () => {
    assert.doesNotThrow(() =>
      validateConfig({
        ...getDefaultConfig(),
        csv: "servers.csv",
        script: "setup.sql",
      })
    );
  });
});
