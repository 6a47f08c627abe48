import test from "node:test";
import assert from "node:assert/strict";
import {
  decodeAdminCommand,
  decodeAdvertisement,
  decodeCoordinatorFrame,
  decodeEndpointFrame,
  decodeRegistration,
  decodeRegistrationResult,
  encodeAdvertisement,
  encodeCoordinatorFrame,
  encodeEndpointFrame,
  encodeRegistration,
  encodeRegistrationResult,
} from "./codec.js";

test("EXECUTE_TASK decodes with its task id and ignores unknown fields", () => {
  const decoded = decodeCoordinatorFrame('{"Command":"EXECUTE_TASK","TaskId":"T1","Priority":3}');
  assert.deepEqual(decoded, { ok: true, message: { type: "EXECUTE_TASK", taskId: "T1" } });
});

test("a command missing a required field is malformed, an unrecognized one is unknown", () => {
  assert.deepEqual(decodeCoordinatorFrame('{"Command":"EXECUTE_TASK"}'), {
    ok: false,
    reason: "malformed",
    detail: "EXECUTE_TASK requires TaskId",
  });
  assert.deepEqual(decodeCoordinatorFrame('{"Command":"REBOOT"}'), {
    ok: false,
    reason: "unknown",
    detail: "Unknown command: REBOOT",
    command: "REBOOT",
  });
});

test("non-object payloads are malformed", () => {
  assert.deepEqual(decodeEndpointFrame("[1,2]"), { ok: false, reason: "malformed", detail: "not a JSON object" });
  assert.deepEqual(decodeEndpointFrame("PING"), { ok: false, reason: "malformed", detail: "not valid JSON" });
});

test("frames without Command decode as replies carrying their extra fields", () => {
  const decoded = decodeCoordinatorFrame(
    '{"Status":"OK","Message":"Diagnostics completed","DiagnosticsResult":"Hostname: lab-1"}'
  );
  assert.deepEqual(decoded, {
    ok: true,
    message: {
      type: "REPLY",
      status: "OK",
      message: "Diagnostics completed",
      fields: { DiagnosticsResult: "Hostname: lab-1" },
    },
  });
});

test("idle STATUS_UPDATE goes out with CurrentTask None and comes back as null", () => {
  const wire = encodeEndpointFrame({ type: "STATUS_UPDATE", cpuLoad: 12.5, state: "Available", taskId: null });
  assert.equal(wire, '{"Command":"STATUS_UPDATE","CpuLoad":12.5,"Status":"Available","CurrentTask":"None"}');

  const decoded = decodeEndpointFrame(wire);
  assert.deepEqual(decoded, {
    ok: true,
    message: { type: "STATUS_UPDATE", cpuLoad: 12.5, state: "Available", taskId: null },
  });
});

test("STATUS_UPDATE without CpuLoad or with an unknown state is malformed", () => {
  const noLoad = decodeEndpointFrame('{"Command":"STATUS_UPDATE","Status":"Available"}');
  assert.equal(noLoad.ok, false);
  assert.equal(noLoad.ok === false && noLoad.detail, "STATUS_UPDATE requires numeric CpuLoad");

  const badState = decodeEndpointFrame('{"Command":"STATUS_UPDATE","CpuLoad":1,"Status":"Sleeping"}');
  assert.equal(badState.ok === false && badState.reason, "malformed");
});

test("TASK_COMPLETED defaults a missing result to an empty string", () => {
  assert.deepEqual(decodeEndpointFrame('{"Command":"TASK_COMPLETED","TaskId":"T9"}'), {
    ok: true,
    message: { type: "TASK_COMPLETED", taskId: "T9", result: "" },
  });
});

test("coordinator frames encode with the Command discriminator", () => {
  assert.equal(encodeCoordinatorFrame({ type: "EXECUTE_TASK", taskId: "T1" }), '{"Command":"EXECUTE_TASK","TaskId":"T1"}');
  assert.equal(encodeCoordinatorFrame({ type: "STOP_TASK" }), '{"Command":"STOP_TASK"}');
  assert.equal(
    encodeCoordinatorFrame({ type: "REPLY", status: "Error", message: "Unknown command: X", fields: {} }),
    '{"Status":"Error","Message":"Unknown command: X"}'
  );
});

test("registration requires the REGISTER command and typed fields", () => {
  assert.deepEqual(
    decodeRegistration('{"Command":"REGISTER","Name":"ep-1","HardwareInfo":"CPU: 8 cores.","GpuEnabled":true}'),
    {
      ok: true,
      message: {
        type: "REGISTER",
        endpointName: "ep-1",
        hardwareDescription: "CPU: 8 cores.",
        acceleratorAvailable: true,
      },
    }
  );
  assert.deepEqual(decodeRegistration('{"Command":"HELLO"}'), {
    ok: false,
    reason: "malformed",
    detail: "Invalid registration message. Expected REGISTER command.",
  });
  assert.deepEqual(decodeRegistration('{"Command":"REGISTER","GpuEnabled":"yes"}'), {
    ok: false,
    reason: "malformed",
    detail: "GpuEnabled must be a boolean",
  });
});

test("the registering process's instance id travels as InstanceId", () => {
  const wire = encodeRegistration({
    type: "REGISTER",
    endpointName: "ep-1",
    hardwareDescription: "",
    acceleratorAvailable: false,
    instanceId: "inst-1",
  });
  assert.equal(wire, '{"Command":"REGISTER","Name":"ep-1","HardwareInfo":"","GpuEnabled":false,"InstanceId":"inst-1"}');
  assert.deepEqual(decodeRegistration(wire), {
    ok: true,
    message: {
      type: "REGISTER",
      endpointName: "ep-1",
      hardwareDescription: "",
      acceleratorAvailable: false,
      instanceId: "inst-1",
    },
  });
  assert.deepEqual(decodeRegistration('{"Command":"REGISTER","InstanceId":5}'), {
    ok: false,
    reason: "malformed",
    detail: "InstanceId must be a string",
  });
});

test("a FAILED registration result travels as Status Error", () => {
  const wire = encodeRegistrationResult({ status: "FAILED", detail: "bad request" });
  assert.equal(wire, '{"Status":"Error","Message":"bad request"}');
  assert.deepEqual(decodeRegistrationResult(wire), {
    ok: true,
    message: { status: "FAILED", detail: "bad request", endpointId: undefined },
  });
});

test("admin commands decode their arguments", () => {
  assert.deepEqual(
    decodeAdminCommand('{"Command":"SET_SETTINGS","ServerPort":8000,"BeaconPort":8001,"EndpointPort":8002}'),
    {
      ok: true,
      message: { type: "SET_SETTINGS", settings: { serverPort: 8000, beaconPort: 8001, endpointPort: 8002 } },
    }
  );
  assert.deepEqual(decodeAdminCommand('{"Command":"EXECUTE_TASK","EndpointName":"ep-1","TaskId":"T5"}'), {
    ok: true,
    message: { type: "EXECUTE_TASK", endpoint: "ep-1", taskId: "T5" },
  });
  assert.deepEqual(decodeAdminCommand('{"Command":"RESTART_ENDPOINT"}'), {
    ok: false,
    reason: "malformed",
    detail: "Endpoint name not specified",
  });
});

test("beacon advertisement survives encoding and rejects datagrams without an address", () => {
  const ad = {
    name: "srv1",
    address: "10.0.0.5",
    port: 7000,
    sessionCount: 2,
    clientCount: 1,
    accelerated: false,
    timestamp: new Date("2026-01-01T00:00:00.000Z"),
  };
  assert.deepEqual(decodeAdvertisement(encodeAdvertisement(ad)), { ok: true, message: ad });
  assert.deepEqual(decodeAdvertisement('{"ServerName":"srv1","ServerPort":7000}'), {
    ok: false,
    reason: "malformed",
    detail: "beacon requires ServerIP",
  });
});
