import {ControllerPool} from '../src';

const pool = new ControllerPool([
    {host: '192.168.1.6'},
    {host: '192.168.1.7', port: 50000, groups: {1: 'white', 2: 'white'}},
]);

const main = async (): Promise<void> => {
    // Frames to both bridges share one 100 ms pacing stream.
    await pool.execute(0, 'setColor', 'lime_green');
    await pool.execute(1, 'white');

    // A B C, A B C, A B C instead of A A A, B B B, C C C.
    await pool.controller(0).batchRun(['setColor', 'red', 1], ['setColor', 'aqua', 2], ['off', 3]);
};

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
