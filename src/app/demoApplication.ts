/**
 * @file Demo Application
 *
 * A program that declares one parameter of each flavour and does nothing
 * else. Handy for looking at the synopsis, the manifest and ini output.
 *
 * @module app
 */

import { Application, type ApplicationOptions } from './Application.js';

export type DemoOptions = Omit<ApplicationOptions, 'title' | 'description' | 'metadata'>;

export function demoApplication_create(options: DemoOptions = {}): Application {
    const app: Application = new Application({
        ...options,
        title: 'The Big Test',
        description: 'Does absolutely nothing.',
        metadata: { category: 'Toys', version: '1.0', contributor: 'Santa' }
    });

    // Basic types
    app.param_define('boolean', 'Basic Types', 'Bool Param').declare('Just a test', 'b').value_set(true);

    // Enumerations: declared with its items, assigned through a plain double
    app.param_define('double-enumeration', 'EnumTypes', 'Double Enum').enumeration_set('0.1,0.2,0.3,0.4');
    app.param_access('double', 'EnumTypes', 'Double Enum').value_set(0.3);

    // Vectors
    app.param_define('double-vector', 'Vector Types', 'Double Vec').text_set('1,2,3,4');

    // Special
    app.param_define('file', 'Special', 'File')
        .fileExtensions_set('bli,bla,blbub')
        .declare('Input File', 0)
        .channel_set(true);
    app.param_define('double', 'Special', 'Slider').range_set(0, 1).value_set(0.333);

    return app;
}
