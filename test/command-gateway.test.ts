import CommandGateway from '../src/command-gateway';
import { CommandError, ProtocolError } from '../src/errors';
import { HistorySink } from '../src/history';
import SharedState from '../src/shared-state';
import { createFakeClient, FakeClient, loadRegistry, silentLogger } from './helpers';

describe('CommandGateway', () => {
    const registry = loadRegistry();
    let client: FakeClient;
    let state: SharedState;
    let history: jest.Mocked<HistorySink>;
    let gateway: CommandGateway;

    beforeEach(() => {
        client = createFakeClient();
        state = new SharedState(registry);
        state.setStatus('connected');
        history = { recordReading: jest.fn(), recordSetpointChange: jest.fn() };
        gateway = new CommandGateway(client, state, registry, { logger: silentLogger(), history });
    });

    describe('setSetpoint', () => {
        test('writes the raw value to the resolved register', async () => {
            await expect(gateway.setSetpoint('soil_temp_sp', 2500)).resolves.toEqual({ name: 'soil_temp_sp', value: 2500 });
            expect(client.writeRegister).toHaveBeenCalledWith(102, 2500);
        });

        test('resets the cached setpoint to its default by default', async () => {
            state.applySetpoints({ soil_temp_sp: { kind: 'float', value: 24 } });

            await gateway.setSetpoint('soil_temp_sp', 2500);

            expect(state.read().setpoints.soil_temp_sp).toEqual({ kind: 'float', value: 0 });
        });

        test('caches the written value in written mode', async () => {
            gateway = new CommandGateway(client, state, registry, { logger: silentLogger(), setpointCacheMode: 'written' });

            await gateway.setSetpoint('soil_humidity_sp', 6550);

            expect(state.read().setpoints.soil_humidity_sp).toEqual({ kind: 'float', value: 65.5 });
        });

        test('records the change in history', async () => {
            await gateway.setSetpoint('air_humidity_sp', 7000);
            expect(history.recordSetpointChange).toHaveBeenCalledWith({ name: 'air_humidity_sp', rawValue: 7000, value: 70 });
        });

        test('rejects unknown setpoints without touching the transport', async () => {
            const err = await gateway.setSetpoint('not_a_setpoint', 100).catch(e => e);

            expect(err).toBeInstanceOf(CommandError);
            expect(err.code).toBe('UNKNOWN_SETPOINT');
            expect(client.writeRegister).not.toHaveBeenCalled();
        });

        test('rejects values that do not fit a register', async () => {
            await expect(gateway.setSetpoint('soil_temp_sp', 70000)).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
            await expect(gateway.setSetpoint('soil_temp_sp', 12.5)).rejects.toMatchObject({ code: 'INVALID_REQUEST' });
            expect(client.writeRegister).not.toHaveBeenCalled();
        });

        test('a rejected write leaves the state untouched', async () => {
            state.applySetpoints({ soil_temp_sp: { kind: 'float', value: 24 } });
            client.writeRegister.mockRejectedValueOnce(new ProtocolError('protocol', 'write', 'Illegal data value', 3));
            const before = state.read();

            await expect(gateway.setSetpoint('soil_temp_sp', 2500)).rejects.toMatchObject({ code: 'WRITE_FAILED' });

            expect(state.read()).toBe(before);
            expect(history.recordSetpointChange).not.toHaveBeenCalled();
        });

        test('a transport failure also marks the connection lost', async () => {
            client.writeRegister.mockRejectedValueOnce(new ProtocolError('transport', 'write', 'EPIPE'));

            await expect(gateway.setSetpoint('soil_temp_sp', 2500)).rejects.toMatchObject({ code: 'WRITE_FAILED' });

            expect(state.read().status).toBe('disconnected');
            expect(client.writeRegister).toHaveBeenCalledTimes(1);
        });

        test('refuses to write while disconnected', async () => {
            state.setStatus('disconnected');

            await expect(gateway.setSetpoint('soil_temp_sp', 2500)).rejects.toMatchObject({ code: 'WRITE_FAILED' });
            expect(client.writeRegister).not.toHaveBeenCalled();
        });
    });

    describe('toggleOrSet', () => {
        test('toggle writes the negation of the cached state', async () => {
            state.applyCommandResult('cooling_status', { kind: 'bool', value: false });

            await expect(gateway.toggleOrSet('cooling_status', 'toggle')).resolves.toEqual({ name: 'cooling_status', state: true });

            expect(client.writeRegister).toHaveBeenCalledWith(4, 1);
            expect(state.read().values.cooling_status).toEqual({ kind: 'bool', value: true });
        });

        test('toggle from true writes 0', async () => {
            state.applyCommandResult('lamp_status', { kind: 'bool', value: true });

            await gateway.toggleOrSet('lamp_status', 'toggle');

            expect(client.writeRegister).toHaveBeenCalledWith(6, 0);
            expect(state.read().values.lamp_status.value).toBe(false);
        });

        test('explicit booleans set the state', async () => {
            await gateway.toggleOrSet('heating_status', true);
            await gateway.toggleOrSet('heating_status', true);

            expect(client.writeRegister.mock.calls).toEqual([[5, 1], [5, 1]]);
            expect(state.read().values.heating_status.value).toBe(true);
        });

        test('rejects non-boolean and unknown names', async () => {
            await expect(gateway.toggleOrSet('soil_temp', 'toggle')).rejects.toMatchObject({ code: 'INVALID_COMMAND' });
            await expect(gateway.toggleOrSet('fan_status', true)).rejects.toMatchObject({ code: 'INVALID_COMMAND' });
            expect(client.writeRegister).not.toHaveBeenCalled();
        });

        test('a failed write does not update the cache', async () => {
            client.writeRegister.mockRejectedValueOnce(new ProtocolError('protocol', 'write', 'Slave device failure', 4));

            await expect(gateway.toggleOrSet('lamp_status', 'toggle')).rejects.toMatchObject({ code: 'WRITE_FAILED' });

            expect(state.read().values.lamp_status.value).toBe(false);
            expect(state.read().status).toBe('connected');
        });
    });
});
