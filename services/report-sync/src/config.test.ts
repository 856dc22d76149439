import { loadReportSyncConfig } from "./config";

const env = {
    COMPARTMENT_ID: "test-compartment",
    DATA_SOURCE_ID: "test-data-source",
    OBJECT_STORE_REGION: "us-ashburn-1",
    OBJECT_STORE_ACCESS_KEY_ID: "test-access-key",
    OBJECT_STORE_SECRET_ACCESS_KEY: "test-secret",
};

test("loads deployment constants and object-store keys from the environment", () => {
    expect(loadReportSyncConfig({ ...env, OBJECT_STORE_ENDPOINT_TEMPLATE: "" })).toEqual({
        compartmentId: "test-compartment",
        dataSourceId: "test-data-source",
        objectStoreRegion: "us-ashburn-1",
        objectStoreEndpointTemplate: undefined,
        objectStoreCredentials: { accessKeyId: "test-access-key", secretAccessKey: "test-secret" },
    });
});

test("blank identifiers are configuration-invalid", () => {
    expect(() => loadReportSyncConfig({ ...env, COMPARTMENT_ID: "  " }))
        .toThrow("invalid configuration: COMPARTMENT_ID is required");
});

test("missing object-store keys are configuration-invalid", () => {
    expect(() => loadReportSyncConfig({
        COMPARTMENT_ID: "test-compartment",
        DATA_SOURCE_ID: "test-data-source",
        OBJECT_STORE_REGION: "us-ashburn-1",
        OBJECT_STORE_SECRET_ACCESS_KEY: " ",
    })).toThrow(
        "invalid configuration: OBJECT_STORE_ACCESS_KEY_ID is required; OBJECT_STORE_SECRET_ACCESS_KEY is required",
    );
});
