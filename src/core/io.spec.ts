import { suite, test } from "node:test";
import assert from "node:assert";
import { Duplex } from "stream";
import { IAC, MAX_LINE_LENGTH, StandardMudClient, TelnetFilter } from "./io.js";

/**
 * In-memory duplex standing in for a TCP socket. Data pushed into it is what
 * the "remote" typed; `sent` collects what the client wrote.
 */
function fakeSocket() {
	const sent: string[] = [];
	const socket = new Duplex({
		read() {},
		write(chunk, _encoding, callback) {
			sent.push(String(chunk));
			callback();
		},
	});
	return { socket, sent };
}

function tick(): Promise<void> {
	return new Promise((resolve) => setImmediate(resolve));
}

function collect(client: StandardMudClient): string[] {
	const lines: string[] = [];
	client.on("input", (line) => lines.push(line));
	return lines;
}

suite("core/io.ts", () => {
	suite("TelnetFilter", () => {
		test("should strip option negotiation", () => {
			const filter = new TelnetFilter();
			const out = filter.process(
				Buffer.from([IAC.IAC, IAC.WILL, 1, 0x68, 0x69, IAC.IAC, IAC.DO, 3])
			);
			assert.strictEqual(out.toString(), "hi");
		});

		test("should strip subnegotiation blocks", () => {
			const filter = new TelnetFilter();
			const out = filter.process(
				Buffer.from([0x61, IAC.IAC, IAC.SB, 24, 0, 0x78, IAC.IAC, IAC.SE, 0x62])
			);
			assert.strictEqual(out.toString(), "ab");
		});

		test("should keep an escaped 0xFF byte", () => {
			const filter = new TelnetFilter();
			const out = filter.process(Buffer.from([0x61, IAC.IAC, IAC.IAC, 0x62]));
			assert.deepStrictEqual([...out], [0x61, 0xff, 0x62]);
		});

		test("should remove a sequence split across chunks", () => {
			const filter = new TelnetFilter();
			const first = filter.process(Buffer.from([0x6c, IAC.IAC]));
			const second = filter.process(Buffer.from([IAC.WONT, 1, 0x6f]));
			assert.strictEqual(Buffer.concat([first, second]).toString(), "lo");
		});
	});

	suite("StandardMudClient", () => {
		test("should emit one trimmed line per LF or CRLF", async () => {
			const { socket } = fakeSocket();
			const client = new StandardMudClient(socket);
			const lines = collect(client);
			socket.push("look\r\n  say hi  \n\r\n");
			await tick();
			assert.deepStrictEqual(lines, ["look", "say hi", ""]);
		});

		test("should buffer a partial line until it ends", async () => {
			const { socket } = fakeSocket();
			const client = new StandardMudClient(socket);
			const lines = collect(client);
			socket.push("no");
			await tick();
			assert.deepStrictEqual(lines, []);
			socket.push("rth\r\n");
			await tick();
			assert.deepStrictEqual(lines, ["north"]);
		});

		test("should decode a multi-byte character split between reads", async () => {
			const { socket } = fakeSocket();
			const client = new StandardMudClient(socket);
			const lines = collect(client);
			const bytes = Buffer.from("say ¡Hola!\n");
			socket.push(bytes.subarray(0, 5));
			await tick();
			socket.push(bytes.subarray(5));
			await tick();
			assert.deepStrictEqual(lines, ["say ¡Hola!"]);
		});

		test("should drop telnet commands from the input", async () => {
			const { socket } = fakeSocket();
			const client = new StandardMudClient(socket);
			const lines = collect(client);
			socket.push(Buffer.from([IAC.IAC, IAC.DO, 1, 0x77, 0x68, 0x6f, 0x0d, 0x0a]));
			await tick();
			assert.deepStrictEqual(lines, ["who"]);
		});

		test("should drop a line that grows past the length limit", async () => {
			const { socket } = fakeSocket();
			const client = new StandardMudClient(socket);
			const lines = collect(client);
			socket.push("x".repeat(MAX_LINE_LENGTH + 1));
			await tick();
			socket.push("still the same line\nlook\n");
			await tick();
			socket.push(`${"y".repeat(MAX_LINE_LENGTH + 1)}\nwho\n`);
			await tick();
			assert.deepStrictEqual(lines, ["look", "who"]);
		});

		test("should write until closed", async () => {
			const { socket, sent } = fakeSocket();
			const client = new StandardMudClient(socket);
			assert.strictEqual(client.getAddress(), "local");
			assert.strictEqual(client.isConnected(), true);
			assert.strictEqual(client.write("hello\r\n"), true);

			const closed = new Promise<void>((resolve) => client.once("close", () => resolve()));
			client.close();
			assert.strictEqual(client.isConnected(), false);
			assert.strictEqual(client.write("late"), false);
			await closed;
			assert.deepStrictEqual(sent, ["hello\r\n"]);
		});
	});
});
