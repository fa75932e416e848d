import { describe, expect, it } from "vitest";
import { readEnvironment } from "../src/env.js";

describe("readEnvironment", () => {
  it("maps set variables to lowercase keys", () => {
    const env = readEnvironment({
      RACKOPS_USERNAME: "bob",
      RACKOPS_PASSWORD: "test-secret",
      RACKOPS_NFS_SHARE: "nfs.example.test:/exports",
      RACKOPS_HTTP_SHARE: "http://share.example.test/isos"
    });
    expect(env).toEqual({
      username: "bob",
      password: "test-secret",
      nfs_share: "nfs.example.test:/exports",
      http_share: "http://share.example.test/isos"
    });
  });

  it("omits unset and empty variables", () => {
    expect(readEnvironment({ RACKOPS_USERNAME: "", RACKOPS_NFS_SHARE: "nfs:/x", HOME: "/home/op" })).toEqual({
      nfs_share: "nfs:/x"
    });
  });

  it("reads the http share only under its upper-case name", () => {
    expect(readEnvironment({ RACKOPS_http_SHARE: "http://wrong.example.test" })).toEqual({});
  });

  it("does not validate values", () => {
    expect(readEnvironment({ RACKOPS_USERNAME: "  " })).toEqual({ username: "  " });
  });
});
