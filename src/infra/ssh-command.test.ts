import { describe, expect, it } from "vitest";
import { createForwardingSpec } from "../../packages/supervisor/src/index.js";
import { buildSshArgs, buildSshCommand, formatSshCommand, toSshForwardArg } from "./ssh-command.js";

const target = { host: "bastion.example.test", port: 22, user: "deploy" };

describe("ssh command", () => {
  it("builds a local forward", () => {
    const spec = createForwardingSpec({
      mode: "local",
      localPort: 8080,
      remoteHost: "db.internal",
      remotePort: 5432,
    });
    expect(buildSshArgs(target, spec)).toEqual([
      "-N",
      "-o",
      "ServerAliveInterval=30",
      "-o",
      "ExitOnForwardFailure=yes",
      "-o",
      "StrictHostKeyChecking=accept-new",
      "-L",
      "127.0.0.1:8080:db.internal:5432",
      "-p",
      "22",
      "deploy@bastion.example.test",
    ]);
  });

  it("builds a remote forward with an identity file and custom port", () => {
    const spec = createForwardingSpec({
      mode: "remote",
      bindAddress: "0.0.0.0",
      localPort: 9000,
      remoteHost: "localhost",
      remotePort: 3000,
    });
    const args = buildSshArgs({ ...target, port: 2222, identityFile: "/keys/test-key" }, spec);
    expect(args.slice(7)).toEqual([
      "-R",
      "0.0.0.0:9000:localhost:3000",
      "-i",
      "/keys/test-key",
      "-p",
      "2222",
      "deploy@bastion.example.test",
    ]);
  });

  it("brackets bare IPv6 addresses", () => {
    const spec = createForwardingSpec({
      mode: "local",
      bindAddress: "::1",
      localPort: 80,
      remoteHost: "fd00::5",
      remotePort: 8080,
    });
    expect(toSshForwardArg(spec)).toBe("[::1]:80:[fd00::5]:8080");
  });

  it("quotes words the shell would expand", () => {
    const spec = createForwardingSpec({
      mode: "local",
      bindAddress: "*",
      localPort: 8080,
      remoteHost: "web",
      remotePort: 80,
    });
    const command = buildSshCommand({ ...target, identityFile: "/keys/my key" }, spec);
    expect(formatSshCommand(command)).toBe(
      "ssh -N -o ServerAliveInterval=30 -o ExitOnForwardFailure=yes " +
        "-o StrictHostKeyChecking=accept-new -L '*:8080:web:80' -i '/keys/my key' " +
        "-p 22 deploy@bastion.example.test",
    );
  });
});
