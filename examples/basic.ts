import {LedController} from '../src';

const led = new LedController(process.env.MILIGHT_HOST ?? '192.168.1.6', {
    groups: {2: 'white'},
});
led.events.on('frame', (frame) => console.log(`sent ${frame.toString('hex')}`));

const main = async (): Promise<void> => {
    await led.setColor('red', 1);
    await led.setBrightness(50, 1);
    await led.setColor([0, 128, 255], 1);
    await led.warmer(2, 3);
    await led.nightmode();
};

main().catch((err: unknown) => {
    console.error(err);
    process.exitCode = 1;
});
