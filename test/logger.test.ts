import { createLogger, isLogLevel } from "../src/utils/logger";

describe("createLogger", () => {
    let logSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        logSpy = jest.spyOn(console, "log").mockImplementation(() => {});
        warnSpy = jest.spyOn(console, "warn").mockImplementation(() => {});
        errorSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test("info logs by default, debug does not", () => {
        const logger = createLogger();

        expect(logger.level).toBe("info");

        logger.info("hello");
        logger.debug("hidden");

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(logSpy).toHaveBeenCalledWith("hello");
    });

    test("debug logs only at debug level", () => {
        createLogger("debug").debug("yep");

        expect(logSpy).toHaveBeenCalledWith("[debug] yep");
    });

    test("silent suppresses info and debug but not warnings or errors", () => {
        const logger = createLogger("silent");

        logger.info("hidden");
        logger.debug("hidden");
        logger.warn("odd");
        logger.error("boom");

        expect(logSpy).not.toHaveBeenCalled();
        expect(warnSpy).toHaveBeenCalledWith("odd");
        expect(errorSpy).toHaveBeenCalledWith("boom");
    });
});

test("isLogLevel accepts only known levels", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
});
