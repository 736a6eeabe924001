/**
 * UDP datagram transport.
 * @module limitless/transport
 */
import {createSocket} from 'dgram';

/** Fire-and-forget datagram sender consumed by the controller. */
export type DatagramTransport = {
    send(frame: Buffer, host: string, port: number): Promise<void>;
};

/**
 * Sends each frame from a fresh `udp4` socket and closes it afterwards.
 * The bridge never replies, so nothing is bound or read.
 */
export class UdpTransport implements DatagramTransport {
    public async send(frame: Buffer, host: string, port: number): Promise<void> {
        const socket = createSocket('udp4');
        try {
            await new Promise<void>((resolve, reject) => {
                socket.once('error', reject);
                socket.send(frame, port, host, (err) => {
                    if (err) reject(err);
                    else resolve();
                });
            });
        } finally {
            socket.close();
        }
    }
}
