import { parseReportObjectEvent } from "./event";
import { ReportSyncError } from "./errors";

const event = {
    eventType: "com.example.objectstorage.createobject",
    data: {
        resourceName: "ADDM_PROD_500.html",
        additionalDetails: { bucketName: "perf-reports", namespace: "acme-ns" },
    },
};

test("parses an object event given as JSON text or object", () => {
    const expected = { objectName: "ADDM_PROD_500.html", bucket: "perf-reports", namespace: "acme-ns" };
    expect(parseReportObjectEvent(JSON.stringify(event))).toEqual(expected);
    expect(parseReportObjectEvent(event)).toEqual(expected);
});

test("invalid JSON is payload-malformed", () => {
    let err: unknown;
    try {
        parseReportObjectEvent("{not json");
    } catch (e) {
        err = e;
    }
    expect(err).toBeInstanceOf(ReportSyncError);
    expect(err).toMatchObject({ kind: "payload-malformed" });
});

test("missing namespace names the field", () => {
    const broken = { data: { resourceName: "x_1.html", additionalDetails: { bucketName: "b" } } };
    expect(() => parseReportObjectEvent(broken)).toThrow("invalid storage event: data.additionalDetails.namespace: Required");
});
