import type { MatcherFunction } from 'expect';
import fsExtra from "fs-extra";
import * as jestExtendedMatchers from 'jest-extended';

const toPathExist: MatcherFunction = function (actual: unknown) {
    if (typeof actual !== 'string') {
        throw new TypeError('The parameter must be a string!');
    }

    const pass = fsExtra.pathExistsSync(actual);
    if (pass) {
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) } path not to exist`,
            pass: true,
        };
    } else {
        return {
            message: () =>
                `expected ${ this.utils.printReceived(actual) } path to exist`,
            pass: false,
        };
    }
}

const toBeSymlinkTo: MatcherFunction<[target: string]> = function (actual: unknown, target: string) {
    if (typeof actual !== 'string') {
        throw new TypeError('The parameter must be a string!');
    }

    let linkTarget: string | undefined;
    try {
        linkTarget = fsExtra.lstatSync(actual).isSymbolicLink() ? fsExtra.readlinkSync(actual) : undefined;
    } catch {
        linkTarget = undefined;
    }
    const pass = linkTarget === target;
    return {
        message: () =>
            `expected ${ this.utils.printReceived(actual) } ${ pass ? "not " : "" }to be a symlink to ${
                this.utils.printExpected(target) }, found ${ this.utils.printReceived(linkTarget) }`,
        pass,
    };
}

expect.extend({
    toPathExist,
    toBeSymlinkTo,
    ...jestExtendedMatchers,
});

declare global {
    // eslint-disable-next-line @typescript-eslint/no-namespace
    namespace jest {
        // noinspection JSUnusedGlobalSymbols
        interface AsymmetricMatchers {
            toPathExist(): void;
            toBeSymlinkTo(target: string): void;
        }

        // noinspection JSUnusedGlobalSymbols
        interface Matchers<R> {
            toPathExist(): R;
            toBeSymlinkTo(target: string): R;
        }
    }
}
