import { describe, expect, it, vi } from "vitest";
import { ServiceError } from "../src/errors";
import { LoginScreen } from "../src/screens/login";
import type { AuthService } from "../src/services";
import { Settings } from "../src/settings";
import type { Credentials } from "../src/types";
import { startApp } from "./helpers";

function fakeAuth() {
	return {
		validate: vi.fn(async (credentials: Credentials): Promise<string | null> =>
			credentials.session === "test-session" ? "test-user" : null,
		),
	};
}

describe("LoginScreen", () => {
	it("signs in with stored credentials on entry", async () => {
		const auth = fakeAuth();
		const settings = Settings.isolated({ "credentials.session": "test-session", "credentials.csrfToken": "test-csrf" });
		const { app } = await startApp({ services: { auth }, settings, initialScreen: new LoginScreen() });

		expect(auth.validate).toHaveBeenCalledWith({ session: "test-session", csrfToken: "test-csrf" });
		expect(app.navigator.screens.map(s => s.kind)).toEqual(["problemList"]);
		expect(app.notification).toEqual({ message: "Signed in as test-user", tone: "success" });
	});

	it("walks through the menu, session and token steps", async () => {
		const auth = fakeAuth();
		const settings = Settings.isolated();
		const login = new LoginScreen();
		const { app, press, flush } = await startApp({ services: { auth }, settings, initialScreen: login });
		expect(login.step).toBe("menu");

		press("\r");
		expect(login.step).toBe("session");
		press(..."test-session");
		press("\r");
		expect(login.step).toBe("csrf");
		press(..."test-csrf", "\r");
		expect(login.step).toBe("validating");

		await flush();
		expect(app.navigator.active?.kind).toBe("problemList");
		expect(settings.get("credentials.session")).toBe("test-session");
		expect(settings.get("credentials.csrfToken")).toBe("test-csrf");
	});

	it("masks what is typed", async () => {
		const { terminal, press } = await startApp({ services: { auth: fakeAuth() }, initialScreen: new LoginScreen() });
		press("\r", "a", "b", "c");
		expect(terminal.getViewport()[11]).toBe(`${" ".repeat(15)}│ ***_${" ".repeat(43)}│`);
	});

	it("requires a session cookie", async () => {
		const login = new LoginScreen();
		const { press } = await startApp({ services: { auth: fakeAuth() }, initialScreen: login });
		press("\r", "\r");
		expect(login.step).toBe("session");
		expect(login.error).toBe("Session cookie is required");
	});

	it("returns to the menu when the credentials are rejected", async () => {
		const login = new LoginScreen();
		const { app, press, flush } = await startApp({ services: { auth: fakeAuth() }, initialScreen: login });
		press("\r", "x", "\r", "y", "\r");
		await flush();
		expect(login.step).toBe("menu");
		expect(login.error).toBe("Invalid credentials");
		expect(app.navigator.active).toBe(login);
	});

	it("shows service failures as a login error", async () => {
		const auth: AuthService = {
			validate: async () => {
				throw new ServiceError("service unavailable");
			},
		};
		const login = new LoginScreen();
		const { press, flush } = await startApp({ services: { auth }, initialScreen: login });
		press("\r", "x", "\r", "y", "\r");
		await flush();
		expect(login.error).toBe("Login failed: service unavailable");
	});

	it("drops the answer when validation is cancelled", async () => {
		const auth = fakeAuth();
		const login = new LoginScreen();
		const { app, press, flush } = await startApp({ services: { auth }, initialScreen: login });
		press("\r", ..."test-session", "\r", "t", "\r", "\x1b");
		expect(login.step).toBe("menu");
		await flush();
		expect(app.navigator.active).toBe(login);
	});

	it("quits on Esc at the menu", async () => {
		const { app, press } = await startApp({ services: { auth: fakeAuth() }, initialScreen: new LoginScreen() });
		press("\x1b");
		expect(app.running).toBe(false);
		expect(app.navigator.screens).toEqual([]);
	});
});
