import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { isMissingDirectory, uploadLocalCsvFiles } from "./handler";
import { noMetrics } from "../../libs/obs/metrics";
import { CapturingLogger, InMemoryStorage } from "../../libs/testing/fakes";

let dir: string;

beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "uploader-"));
});

afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
});

function opts(csvLocalDirectory: string) {
    return { bucket: "sales-drop", csvLocalDirectory, prefixDir: "sales/", identifierSeparator: "_" };
}

test("uploads new files and skips ones already in the bucket", async () => {
    await writeFile(join(dir, "sr1_cust_01.csv"), "customer,amount\nc1,10\n");
    await writeFile(join(dir, "sr2_cust_01.csv"), "customer,amount\nc2,20\n");
    await writeFile(join(dir, "sr3_cust_01.csv"), "customer,amount\nc3,30\n");
    const storage = new InMemoryStorage("sales-drop", {
        "sr2_cust_01.csv": "customer,amount\nc2,20\n",
        "sales/sr3/sr3_cust_01.csv": "customer,amount\nc3,30\n",
    });
    const log = new CapturingLogger();

    const result = await uploadLocalCsvFiles({ storage, log, metrics: noMetrics }, opts(dir));

    expect(result).toEqual({ uploaded: ["sr1_cust_01.csv"], skipped: ["sr2_cust_01.csv", "sr3_cust_01.csv"], failures: [] });
    expect(storage.keys("sales-drop")).toEqual(["sales/sr3/sr3_cust_01.csv", "sr1_cust_01.csv", "sr2_cust_01.csv"]);
    expect(log.lines[0]).toBe("INFO Uploaded sr1_cust_01.csv (1 rows) to S3 bucket sales-drop with key sr1_cust_01.csv.");
});

test("a malformed file is reported and the rest still upload", async () => {
    await writeFile(join(dir, "sr1_bad.csv"), "customer,amount\nc1,10,oops\n");
    await writeFile(join(dir, "sr2_good.csv"), "customer,amount\nc2,20\n");
    const storage = new InMemoryStorage("sales-drop");
    const log = new CapturingLogger();

    const result = await uploadLocalCsvFiles({ storage, log, metrics: noMetrics }, opts(dir));

    expect(result.uploaded).toEqual(["sr2_good.csv"]);
    expect(result.failures.map(f => f.file)).toEqual(["sr1_bad.csv"]);
    expect(storage.keys("sales-drop")).toEqual(["sr2_good.csv"]);
    expect(log.lines[0]).toMatch(/^ERROR Failed to upload sr1_bad\.csv: /);
});

test("a failed put does not stop later files", async () => {
    await writeFile(join(dir, "sr1_a.csv"), "customer\nc1\n");
    await writeFile(join(dir, "sr1_b.csv"), "customer\nc2\n");
    const storage = new InMemoryStorage("sales-drop");
    storage.failOn("put", "sr1_a.csv", new Error("SlowDown"));

    const result = await uploadLocalCsvFiles({ storage, log: new CapturingLogger(), metrics: noMetrics }, opts(dir));

    expect(result.failures).toEqual([{ file: "sr1_a.csv", error: "SlowDown" }]);
    expect(result.uploaded).toEqual(["sr1_b.csv"]);
});

test("a missing local directory uploads nothing", async () => {
    const log = new CapturingLogger();
    const missing = join(dir, "nope");

    const result = await uploadLocalCsvFiles({ storage: new InMemoryStorage("sales-drop"), log, metrics: noMetrics }, opts(missing));

    expect(result).toEqual({ uploaded: [], skipped: [], failures: [] });
    expect(log.lines).toEqual([`WARNING Local CSV directory ${missing} does not exist, nothing to upload.`]);
});

test("a missing directory is recognised by its error code alone", () => {
    expect(isMissingDirectory({ code: "ENOENT", message: "scandir failed" })).toBe(true);
    expect(isMissingDirectory(Object.assign(new Error("denied"), { code: "EACCES" }))).toBe(false);
    expect(isMissingDirectory("ENOENT")).toBe(false);
    expect(isMissingDirectory(null)).toBe(false);
});
