import { describe, expect, it } from "vitest";
import {
  artifactCommitArgs,
  commitMessage,
  discoverBranches,
  extractBranchFromLogLine,
  parseArtifactCommit,
  parseArtifactHash,
  recentBranchHashes,
  sanitizeBranchName,
} from "../src/git/log.js";

const LOG = [
  "update for test of gfortran_10.3.0_mpich3_g_develop with hash v8.5.0-3-gaaa1111 on acorn",
  "update for test of intel_2021.4_mpt_O_develop with hash v8.5.0-3-gaaa1111 on acorn",
  "",
  "update for test of gfortran_10.3.0_mpich3_g_feature/x with hash v8.5.0-2-gbbb2222 on acorn",
  "update for test of gfortran_10.3.0_mpich3_g_develop with hash v8.5.0-1-gccc3333 on acorn",
  "update for test of gfortran_10.3.0_mpich3_g_develop with hash v8.4.0-9-gddd4444 on hera",
  "Merge branch 'acorn' of github.com:example/artifacts",
].join("\n");

describe("parseArtifactHash", () => {
  it("prefers a snapshot tag", () => {
    expect(parseArtifactHash("test of gfortran_O_develop with hash ESMF_8_3_0_beta_snapshot_07-g8913088 on hera")).toBe(
      "ESMF_8_3_0_beta_snapshot_07-g8913088",
    );
  });

  it("falls back to a version hash", () => {
    expect(parseArtifactHash(LOG.split("\n")[0])).toBe("v8.5.0-3-gaaa1111");
  });

  it("returns an empty string when there is none", () => {
    expect(parseArtifactHash("Merge branch 'acorn'")).toBe("");
  });
});

describe("extractBranchFromLogLine", () => {
  it("takes the text between o/g and 'with'", () => {
    expect(extractBranchFromLogLine(LOG.split("\n")[1])).toBe("develop");
    expect(extractBranchFromLogLine(LOG.split("\n")[3])).toBe("feature/x");
  });

  it("returns an empty string for other messages", () => {
    expect(extractBranchFromLogLine("Merge branch 'acorn'")).toBe("");
  });
});

describe("discoverBranches", () => {
  it("lists unique branches in order", () => {
    expect(discoverBranches(LOG)).toEqual(["develop", "feature/x"]);
  });
});

describe("recentBranchHashes", () => {
  it("returns distinct hashes for branch and machine, newest first", () => {
    expect(recentBranchHashes(LOG, "develop", "acorn", 5)).toEqual(["v8.5.0-3-gaaa1111", "v8.5.0-1-gccc3333"]);
  });

  it("stops at the requested number", () => {
    expect(recentBranchHashes(LOG, "develop", "acorn", 1)).toEqual(["v8.5.0-3-gaaa1111"]);
  });

  it("filters by machine", () => {
    expect(recentBranchHashes(LOG, "develop", "hera", 5)).toEqual(["v8.4.0-9-gddd4444"]);
    expect(recentBranchHashes(LOG, "develop", "orion", 5)).toEqual([]);
  });
});

describe("naming", () => {
  it("sanitizes branch names for paths", () => {
    expect(sanitizeBranchName("feature/x/y")).toBe("feature_x_y");
  });

  it("formats the commit message", () => {
    expect(commitMessage("develop", "v8.5.0-3-gaaa1111")).toBe("updated summary for hash v8.5.0-3-gaaa1111 on develop");
  });
});

describe("artifact commits", () => {
  it("asks git for the last commit touching a file", () => {
    expect(artifactCommitArgs("develop/acorn/summary.dat")).toEqual([
      "-1",
      "--format=%H%x09%cI",
      "--",
      "develop/acorn/summary.dat",
    ]);
  });

  it("splits hash and committer date", () => {
    expect(parseArtifactCommit("0123abc\t2024-05-01T12:00:00+00:00\n")).toEqual({
      commit: "0123abc",
      modified: "2024-05-01T12:00:00+00:00",
    });
  });

  it("is empty for a file without history", () => {
    expect(parseArtifactCommit("")).toEqual({ commit: "", modified: "" });
  });
});
